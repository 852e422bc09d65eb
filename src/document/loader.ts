import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';

import { DocumentValidationError, validateDocument } from './schema.js';
import type { AnimationDocument, DocumentValidationIssue } from './types.js';

export type DocumentLoadResult =
  | {
      readonly kind: 'success';
      readonly document: AnimationDocument;
      readonly issues: DocumentValidationIssue[];
      readonly sourceName?: string;
    }
  | {
      readonly kind: 'error';
      readonly message: string;
      readonly issues: DocumentValidationIssue[] | undefined;
      readonly sourceName?: string;
    };

export function loadDocumentFromJson(json: string, sourceName?: string): DocumentLoadResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    return {
      kind: 'error',
      message: error instanceof Error ? error.message : 'Failed to parse JSON document',
      issues: undefined,
      sourceName,
    };
  }

  try {
    const { document, issues } = validateDocument(parsed);
    return { kind: 'success', document, issues, sourceName };
  } catch (error) {
    if (error instanceof DocumentValidationError) {
      return { kind: 'error', message: error.message, issues: error.issues, sourceName };
    }
    throw error;
  }
}

export async function loadDocumentFromFile(path: string): Promise<DocumentLoadResult> {
  const json = await readFile(path, 'utf8');
  return loadDocumentFromJson(json, basename(path));
}
