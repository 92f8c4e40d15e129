import { titleCase } from '../../utils/text.js';

export type TitleOverrides = Readonly<Record<string, string>>;

/** Papers whose embedded PDF title is known to be wrong, keyed by filename. */
export const DEFAULT_TITLE_OVERRIDES: TitleOverrides = {
  'v17s1a3.pdf':
    'Análisis multimétrico para evaluar contaminación en el río Lerma y lago de Chapala, México',
  'v70n1a3.pdf': 'Gestión integrada del agua en la cuenca Lerma-Chapala-Santiago',
  'annurev-ecolsys-120213-091935.pdf':
    'Ecological Restoration of Streams and Rivers: Shifting Strategies and Shifting Goals',
};

export const UNTITLED = 'Untitled';

export const isBadTitle = (title: string): boolean =>
  title === '' || title === UNTITLED || title.endsWith('.indd') || title.toLowerCase().includes('formados');

export const titleFromFilename = (filename: string): string =>
  titleCase(filename.replaceAll('.pdf', '').replaceAll('_', ' '));

export const resolveTitle = (
  filename: string,
  title: string,
  overrides: TitleOverrides = DEFAULT_TITLE_OVERRIDES
): string => {
  const override = overrides[filename];
  if (override !== undefined) return override;
  return isBadTitle(title) ? titleFromFilename(filename) : title;
};
