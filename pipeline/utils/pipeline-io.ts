import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { z } from "zod";
import { errorMessage } from "../../packages/shared/src/text-utils.js";

const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Read a stage artifact, or `null` when the file does not exist.
 * Invalid JSON or a shape mismatch throws.
 */
export const readPipelineFileIfExists = async <Schema extends z.ZodTypeAny>(
  filePath: string,
  schema: Schema
): Promise<z.output<Schema> | null> => {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFileError(error)) {
      return null;
    }
    throw error;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Pipeline file ${filePath} is not valid JSON: ${errorMessage(error)}`);
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const firstIssue = parsed.error.issues[0];
    const location = firstIssue?.path.join(".") || "(root)";
    throw new Error(
      `Pipeline file ${filePath} has an unexpected shape at ${location}: ${firstIssue?.message ?? "invalid"}`
    );
  }

  return parsed.data;
};

export const readPipelineFile = async <Schema extends z.ZodTypeAny>(
  filePath: string,
  schema: Schema,
  stage: string
): Promise<z.output<Schema>> => {
  const data = await readPipelineFileIfExists(filePath, schema);
  if (data === null) {
    throw new Error(`Pipeline file not found: ${filePath}\nRun the "${stage}" stage first.`);
  }
  return data;
};

export const writePipelineFile = async (
  filePath: string,
  rows: ReadonlyArray<unknown>,
  log: (message: string) => void = () => {}
): Promise<void> => {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(rows, null, 2)}\n`, "utf8");
  log(`Saved ${filePath} (${rows.length} record(s))`);
};
