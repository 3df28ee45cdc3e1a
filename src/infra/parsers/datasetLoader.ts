import { promises as fs } from "node:fs";
import { z } from "zod";
import { DatasetFormatError } from "../../domain/errors.js";
import { QaRow } from "../../domain/types.js";

// The published dataset capitalizes Question/Answer; lowercase keys are accepted too.
const qaRecordSchema = z
  .object({
    copyright: z.string().min(1),
    url: z.string().min(1),
    question: z.string().optional(),
    Question: z.string().optional(),
    answer: z.string().optional(),
    Answer: z.string().optional(),
  })
  .transform((record, ctx): QaRow => {
    const question = record.question ?? record.Question;
    const answer = record.answer ?? record.Answer;
    if (question === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "question is required" });
      return z.NEVER;
    }
    if (answer === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "answer is required" });
      return z.NEVER;
    }
    return { copyright: record.copyright, url: record.url, question, answer };
  });

export interface ParseQaOptions {
  sourceName?: string;
  /** When set, invalid lines are reported here and skipped instead of failing the load. */
  onInvalidLine?: (error: DatasetFormatError) => void;
}

export function isRemoteLocation(location: string): boolean {
  return /^https?:\/\//i.test(location);
}

export async function loadQaDataset(
  location: string,
  options: Pick<ParseQaOptions, "onInvalidLine"> = {},
): Promise<QaRow[]> {
  const content = isRemoteLocation(location)
    ? await fetchText(location)
    : await fs.readFile(location, "utf-8");
  return parseQaJsonl(content, { ...options, sourceName: location });
}

export function parseQaJsonl(content: string, options: ParseQaOptions = {}): QaRow[] {
  const sourceName = options.sourceName ?? "dataset";
  const rows: QaRow[] = [];
  const lines = content.split(/\r?\n/);
  const reject = (error: DatasetFormatError) => {
    if (!options.onInvalidLine) {
      throw error;
    }
    options.onInvalidLine(error);
  };

  lines.forEach((line, index) => {
    const trimmed = line.trim();
    if (!trimmed) {
      return;
    }

    let value: unknown;
    try {
      value = JSON.parse(trimmed);
    } catch {
      reject(new DatasetFormatError(sourceName, index + 1, "not valid JSON"));
      return;
    }

    const parsed = qaRecordSchema.safeParse(value);
    if (!parsed.success) {
      const reason = parsed.error.issues
        .map((issue) =>
          issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
        )
        .join("; ");
      reject(new DatasetFormatError(sourceName, index + 1, reason));
      return;
    }
    rows.push(parsed.data);
  });

  return rows;
}

async function fetchText(url: string): Promise<string> {
  const response = await fetch(url);
  if (!response.ok) {
    throw new Error(`Dataset download failed (${response.status}): ${url}`);
  }
  return response.text();
}
