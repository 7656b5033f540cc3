import { Command } from 'commander';
import path from 'path';
import { withApp } from '../utils/app.js';
import { ProgressIndicator, formatDuration, formatFileSize } from '../utils/progress.js';
import { formatCliError } from '../utils/validation.js';

interface AddOptions {
  configPath?: string;
}

export function createAddCommand(): Command {
  return new Command('add')
    .description('Ingest documents (.txt or .pdf) into the knowledge base')
    .argument('<files...>', 'Paths of the documents to add')
    .option('--config-path <path>', 'Path to configuration file')
    .action(async (files: string[], options: AddOptions) => {
      try {
        const failed = await addDocuments(files, options);
        if (failed > 0) {
          process.exit(1);
        }
      } catch (error) {
        console.error(formatCliError(error));
        process.exit(1);
      }
    });
}

async function addDocuments(files: string[], options: AddOptions): Promise<number> {
  console.log('📄 ragrelay document ingestion');
  console.log('');

  return withApp(options.configPath, async app => {
    let failed = 0;

    for (const file of files) {
      const startTime = Date.now();
      const progress = new ProgressIndicator(`Ingesting ${path.basename(file)}...`);
      progress.start();

      try {
        const doc = await app.documents.addFromFile(file);
        if (doc.status === 'ready') {
          progress.stop(`${doc.filename}: ${doc.chunk_count} chunks in ${formatDuration(Date.now() - startTime)}`);
          console.log(`  🆔 Document ID: ${doc.id}`);
          console.log(`  📊 Size: ${formatFileSize(doc.size_bytes)}`);
        } else {
          failed++;
          progress.fail(`${doc.filename}: ${doc.last_error ?? 'ingestion failed'}`);
        }
      } catch (error) {
        failed++;
        progress.fail(`${path.basename(file)}: ${formatCliError(error)}`);
      }
    }

    console.log('');
    console.log(`✅ ${files.length - failed} of ${files.length} documents ready (${app.index.size} chunks indexed)`);
    return failed;
  });
}
