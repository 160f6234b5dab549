import { createTool } from '@mastra/core/tools';
import { z } from 'zod';
import { readdir, readFile, stat } from 'fs/promises';
import { join, extname, basename } from 'path';
import { errorMessage } from '../utils/errors.js';

// Plain-text formats the chunker can take as-is
export const SUPPORTED_EXTENSIONS = ['.txt', '.md', '.text', '.json'] as const;

function isSupportedExtension(ext: string): boolean {
  return SUPPORTED_EXTENSIONS.some((supported) => supported === ext);
}

export interface SourceDocument {
  id: string;
  filename: string;
  extension: string;
  content: string;
  metadata: {
    sizeBytes: number;
    modifiedAt: string;
  };
}

export interface ReadError {
  filename: string;
  error: string;
}

export interface ReadDocumentsResult {
  documents: SourceDocument[];
  errors: ReadError[];
}

/**
 * Read every supported document in a folder (non-recursive), sorted by filename.
 * Unreadable files are reported in `errors` instead of failing the whole read.
 */
export async function readDocuments(folderPath: string, extensions?: string[]): Promise<ReadDocumentsResult> {
  try {
    const folderStat = await stat(folderPath);
    if (!folderStat.isDirectory()) {
      return { documents: [], errors: [{ filename: folderPath, error: 'Path is not a directory' }] };
    }
  } catch {
    return { documents: [], errors: [{ filename: folderPath, error: `Folder not found: ${folderPath}` }] };
  }

  const files = await readdir(folderPath);

  const allowedExtensions = extensions?.length
    ? extensions.map(e => e.toLowerCase())
    : [...SUPPORTED_EXTENSIONS];

  const matchingFiles = files.filter(f => {
    const ext = extname(f).toLowerCase();
    return allowedExtensions.includes(ext) && isSupportedExtension(ext);
  });

  const documents: SourceDocument[] = [];
  const errors: ReadError[] = [];

  await Promise.all(
    matchingFiles.map(async (filename) => {
      const filePath = join(folderPath, filename);
      const ext = extname(filename);

      try {
        const [content, fileStat] = await Promise.all([readFile(filePath, 'utf-8'), stat(filePath)]);
        documents.push({
          id: basename(filename, ext),
          filename,
          extension: ext.toLowerCase(),
          content,
          metadata: {
            sizeBytes: fileStat.size,
            modifiedAt: fileStat.mtime.toISOString(),
          },
        });
      } catch (error) {
        errors.push({ filename, error: errorMessage(error) });
      }
    })
  );

  // Sort for consistent ordering
  documents.sort((a, b) => a.filename.localeCompare(b.filename));
  errors.sort((a, b) => a.filename.localeCompare(b.filename));

  return { documents, errors };
}

export const readDocsTool = createTool({
  id: 'read_docs',
  description: 'Read all text documents from a folder. Supports TXT, MD, TEXT and JSON files.',
  inputSchema: z.object({
    folderPath: z.string().describe('Path to the folder containing documents'),
    extensions: z.array(z.string()).optional().describe('File extensions to include (e.g., [".txt", ".md"]). Defaults to all supported types.'),
  }),
  outputSchema: z.object({
    documents: z.array(z.object({
      id: z.string(),
      filename: z.string(),
      extension: z.string(),
      content: z.string(),
      metadata: z.object({
        sizeBytes: z.number(),
        modifiedAt: z.string(),
      }),
    })),
    count: z.number(),
    errors: z.array(z.object({
      filename: z.string(),
      error: z.string(),
    })).optional(),
  }),
  execute: async ({ context }) => {
    const { documents, errors } = await readDocuments(context.folderPath, context.extensions);

    return {
      documents,
      count: documents.length,
      ...(errors.length > 0 && { errors }),
    };
  },
});
