import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { DocumentSource, ReportDocument } from '../../types/crimeReport';

const rawTableSchema = z.array(z.array(z.string().nullable()));

const documentSchema = z.object({
  pages: z.array(
    z.object({
      text: z.string().default(''),
      tables: z.array(rawTableSchema).default([]),
    })
  ),
});

export function parseJsonDocument(json: string, sourceFile: string): ReportDocument {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    throw new Error(`Document processing failed: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = documentSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(
      `Document processing failed: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid document'}`
    );
  }

  return {
    sourceFile,
    pages: parsed.data.pages.map((page, i) => ({
      pageNumber: i + 1,
      text: page.text,
      tables: page.tables,
    })),
    close: async () => {},
  };
}

export function jsonDocumentSource(filePath: string): DocumentSource {
  return {
    open: async () => {
      const json = await readFile(filePath, 'utf-8');
      return parseJsonDocument(json, path.basename(filePath));
    },
  };
}
