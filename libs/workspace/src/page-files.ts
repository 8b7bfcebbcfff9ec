export type PageExtension = 'png' | 'jpg';

/**
 * Matches engine output and normalized page names alike:
 * `page-1.png`, `page-07.jpg`, `page-012.png`.
 */
const PAGE_FILE_PATTERN = /^page-(\d+)\.(png|jpg)$/;

export interface PageFile {
  name: string;
  page: number;
  extension: PageExtension;
}

export function pageFileName(page: number, extension: PageExtension): string {
  return `page-${page}.${extension}`;
}

export function parsePageFile(name: string): PageFile | null {
  const match = PAGE_FILE_PATTERN.exec(name);
  if (!match) return null;

  const extension: PageExtension = match[2] === 'png' ? 'png' : 'jpg';
  return { name, page: Number.parseInt(match[1], 10), extension };
}

/**
 * Orders page files by page number, anything else after them by name.
 * Plain lexicographic order would put `page-10` before `page-2`.
 */
export function comparePageFiles(a: string, b: string): number {
  const pageA = parsePageFile(a);
  const pageB = parsePageFile(b);

  if (pageA && pageB) return pageA.page - pageB.page || a.localeCompare(b);
  if (pageA) return -1;
  if (pageB) return 1;
  return a.localeCompare(b);
}
