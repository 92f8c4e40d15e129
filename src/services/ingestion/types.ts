import { z } from 'zod';

export const paperInputSchema = z.object({
  filename: z.string().min(1),
  text: z.string().min(1),
  paperId: z.string().min(1).optional(),
  title: z.string().optional(),
  year: z.string().optional(),
  doi: z.string().optional(),
  authors: z.array(z.string().min(1)).default([]),
  concepts: z.array(z.string().min(1)).default([]),
});

export type PaperInput = z.input<typeof paperInputSchema>;

export const manifestSchema = z.object({
  papers: z.array(paperInputSchema).min(1),
});

export interface IndexResult {
  paperId: string;
  title: string;
  year?: string;
  chunks: number;
  processingTime: string;
}
