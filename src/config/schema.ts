import { z } from "zod";

const workerCount = (fallback: number) => z.number().int().positive().default(fallback);

export const appConfigSchema = z.object({
  database: z
    .object({
      path: z.string().min(1).default("./data/articles.db"),
    })
    .default({}),
  workers: z
    .object({
      sourceFetcher: workerCount(2),
      htmlFetcher: workerCount(3),
      content: workerCount(3),
      paginationContent: workerCount(5),
      pageGenerator: workerCount(1),
    })
    .default({}),
  pagination: z
    .object({
      emptyContentMarkers: z.array(z.string().min(1)).default(["0 episodes found"]),
      contentCheckInterval: z.number().int().positive().default(10),
    })
    .default({}),
  http: z
    .object({
      profile: z.enum(["browser", "minimal"]).default("minimal"),
      timeoutMs: z.number().int().positive().optional(),
    })
    .default({}),
  replication: z
    .object({
      batchSize: z.number().int().positive().default(100),
      concurrency: z.number().int().positive().default(5),
    })
    .default({}),
  transcripts: z
    .object({
      workers: workerCount(100),
      max: z.number().int().default(100),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
