export interface Paper {
  id: string;
  title: string;
  filename: string;
  doi?: string;
  year?: string;
  authors: string[];
  concepts: string[];
}

export type PaperMetadata = Paper;

export interface GraphStats {
  papers: number;
  authors: number;
  concepts: number;
}
