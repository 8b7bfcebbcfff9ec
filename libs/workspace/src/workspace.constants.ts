/**
 * Injection tokens for the workspace library.
 */
export const WORKSPACE_OPTIONS = 'WORKSPACE_OPTIONS';
export const WORKSPACE_CLOCK = 'WORKSPACE_CLOCK';

/** Directory name under the OS temp dir when WORKSPACE_ROOT is unset */
export const DEFAULT_ROOT_DIRNAME = 'pdf2img';
