import { z } from 'zod';

/**
 * One search result line of an `ids_from_<start>_to_<end>.jsonl` file
 */
export const ResultItemSchema = z.object({
  datetime: z.string().optional(),
  page: z.number().int().optional(),
  text: z.string().optional(),
  href: z.string().default(''),
});

export type ResultItem = z.infer<typeof ResultItemSchema>;

export type DownloadStatus = 'downloaded' | 'skipped' | 'not_html';

export interface DownloadSummary {
  downloaded: number;
  skipped: number;
  notHtml: number;
  failed: number;
}
