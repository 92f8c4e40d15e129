const TITLE_SCAN_LINES = 30;
const MIN_TITLE_LINE = 30;
const MAX_TITLE_LINE = 150;
const MIN_TITLE_SPACES = 6;

/** Embedded PDF titles are often layout file names or journal boilerplate. */
export const isUsableTitle = (title: string | undefined): title is string =>
  title !== undefined &&
  title.length > 15 &&
  !title.endsWith('.indd') &&
  !title.toLowerCase().includes('formados') &&
  !title.startsWith('0');

export const extractTitleFromText = (text: string): string => {
  const lines = text
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0)
    .slice(0, TITLE_SCAN_LINES);

  const candidate = lines.find(
    line =>
      line.length > MIN_TITLE_LINE &&
      line.length < MAX_TITLE_LINE &&
      line.split(' ').length - 1 >= MIN_TITLE_SPACES
  );
  return candidate ?? '';
};

export const extractYear = (text: string): string | undefined => text.match(/\b(?:19|20)\d{2}\b/)?.[0];

export const fileStem = (filename: string): string => {
  const base = filename.split(/[\\/]/).pop() ?? filename;
  const dot = base.lastIndexOf('.');
  return dot > 0 ? base.slice(0, dot) : base;
};

export const paperIdFromFilename = (filename: string): string => `paper_${fileStem(filename)}`;
