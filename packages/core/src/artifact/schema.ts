import { readFile } from "node:fs/promises";
import { z } from "zod";

// Fields of the wrong type are read as absent; the metrics extractor decides
// which absences are fatal.
const TaskEntrySchema = z
  .object({
    task_id: z.string().optional().catch(undefined),
    success: z.boolean().optional().catch(undefined),
    execution_time: z.number().nonnegative().optional().catch(undefined),
    steps: z.number().nonnegative().optional().catch(undefined),
    total_tokens: z.number().nonnegative().optional().catch(undefined),
    metrics: z
      .object({
        total_tokens: z.number().nonnegative().optional().catch(undefined),
      })
      .passthrough()
      .optional()
      .catch(undefined),
  })
  .passthrough();

const ArtifactMetadataSchema = z
  .object({
    architecture: z.string().optional().catch(undefined),
    model: z.string().optional().catch(undefined),
    provider: z.string().optional().catch(undefined),
    task_suite: z.string().optional().catch(undefined),
    num_tasks: z.number().int().nonnegative().optional().catch(undefined),
  })
  .passthrough();

export const ResultArtifactSchema = z
  .object({
    metadata: ArtifactMetadataSchema.default({}),
    results: z.array(TaskEntrySchema),
  })
  .passthrough();

export type TaskEntry = z.infer<typeof TaskEntrySchema>;
export type ArtifactMetadata = z.infer<typeof ArtifactMetadataSchema>;
export type ResultArtifact = z.infer<typeof ResultArtifactSchema>;

export type ArtifactReadResult =
  | { ok: true; artifact: ResultArtifact }
  | { ok: false; message: string };

export function parseResultArtifact(raw: unknown): ArtifactReadResult {
  const result = ResultArtifactSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return { ok: false, message: `malformed result artifact (${where}${issue?.message ?? "unknown issue"})` };
  }
  return { ok: true, artifact: result.data };
}

export async function readResultArtifact(path: string): Promise<ArtifactReadResult> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (e) {
    return { ok: false, message: `cannot read ${path}: ${e instanceof Error ? e.message : String(e)}` };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    return { ok: false, message: `${path} is not valid JSON: ${e instanceof Error ? e.message : String(e)}` };
  }

  return parseResultArtifact(raw);
}
