import { describe, it, expect } from 'vitest';
import {
  DocumentType,
  ProcessingStatus,
  TERMINAL_STATUSES,
  chunkConfigSchema,
  chunkMetadataSchema,
} from './types.js';

describe('DocumentType', () => {
  it('accepts all document types', () => {
    for (const type of ['legal', 'technical', 'narrative', 'structured', 'mixed', 'unknown']) {
      expect(DocumentType.safeParse(type).success).toBe(true);
    }
  });

  it('rejects unknown types', () => {
    expect(DocumentType.safeParse('invoice').success).toBe(false);
  });
});

describe('chunkConfigSchema', () => {
  it('validates a minimal config and fills flags', () => {
    const result = chunkConfigSchema.safeParse({ chunkSize: 800, chunkOverlap: 150 });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.sentenceBoundary).toBe(true);
      expect(result.data.paragraphBoundary).toBe(true);
      expect(result.data.preserveStructure).toBe(false);
      expect(result.data.minChunkSize).toBe(100);
      expect(result.data.maxChunkSize).toBeUndefined();
    }
  });

  it('rejects overlap equal to chunk size', () => {
    const result = chunkConfigSchema.safeParse({ chunkSize: 100, chunkOverlap: 100 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['chunkOverlap']);
    }
  });

  it('rejects negative overlap and fractional sizes', () => {
    expect(chunkConfigSchema.safeParse({ chunkSize: 100, chunkOverlap: -1 }).success).toBe(false);
    expect(chunkConfigSchema.safeParse({ chunkSize: 10.5, chunkOverlap: 1 }).success).toBe(false);
  });

  it('rejects a non-positive maxChunkSize', () => {
    expect(chunkConfigSchema.safeParse({ chunkSize: 100, chunkOverlap: 10, maxChunkSize: 0 }).success).toBe(false);
  });
});

describe('chunkMetadataSchema', () => {
  it('validates chunking metadata', () => {
    const result = chunkMetadataSchema.safeParse({
      documentType: 'legal',
      chunkCount: 3,
      chunkSize: 800,
      chunkOverlap: 150,
      avgChunkLength: 640.5,
      minChunkLength: 300,
      maxChunkLength: 800,
    });
    expect(result.success).toBe(true);
  });

  it('rejects missing required fields', () => {
    expect(chunkMetadataSchema.safeParse({ documentType: 'legal', chunkCount: 3 }).success).toBe(false);
  });
});

describe('ProcessingStatus', () => {
  it('treats completed, failed and cancelled as terminal', () => {
    const terminal = ProcessingStatus.options.filter((status) => TERMINAL_STATUSES.has(status));
    expect(terminal).toEqual(['completed', 'failed', 'cancelled']);
  });
});
