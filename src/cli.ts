#!/usr/bin/env node
import 'dotenv/config';
import { configFromEnv, createIngestServices, errorMessage, readDocuments } from './mastra/index.js';

async function main() {
  const folderPath = process.argv[2];

  if (!folderPath) {
    console.error('Usage: doc-ingest <folder-path>');
    console.error('Example: doc-ingest ./documents');
    process.exit(1);
  }

  const services = createIngestServices(configFromEnv());

  console.log(`\nChunking documents from: ${folderPath}\n`);

  try {
    const { documents, errors } = await readDocuments(folderPath);

    console.log('='.repeat(60));
    console.log('DOCUMENT CHUNKING RESULTS');
    console.log('='.repeat(60));

    let totalChunks = 0;
    for (const doc of documents) {
      const { metadata } = services.chunker.chunk(doc.content, doc.filename);
      totalChunks += metadata.chunkCount;

      console.log(`\n[${metadata.documentType.toUpperCase()}] ${doc.filename}`);
      console.log(`  Size: ${doc.content.length} chars`);
      console.log(`  Chunks: ${metadata.chunkCount} (size ${metadata.chunkSize}, overlap ${metadata.chunkOverlap})`);
      if (metadata.chunkCount > 0) {
        console.log(
          `  Length: avg ${Math.round(metadata.avgChunkLength)}, min ${metadata.minChunkLength}, max ${metadata.maxChunkLength}`
        );
      }
    }

    console.log('\n' + '-'.repeat(60));
    console.log(`Stats:`);
    console.log(`  Documents: ${documents.length}`);
    console.log(`  Chunks: ${totalChunks}`);

    if (errors.length > 0) {
      console.log('\n' + '-'.repeat(60));
      console.log('ERRORS');
      console.log('-'.repeat(60));
      for (const { filename, error } of errors) {
        console.log(`  ${filename}: ${error}`);
      }
    }
  } catch (error) {
    console.error('Error chunking documents:', errorMessage(error));
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
