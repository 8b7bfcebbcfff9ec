/** Response body for GET /health */
export class HealthStatusDto {
  status!: 'healthy' | 'degraded';
  engine_available!: boolean;
  workspace_root!: string;
}
