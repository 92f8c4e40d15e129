export interface EntitySet {
  authors: string[];
  concepts: string[];
  keywords: string[];
}
