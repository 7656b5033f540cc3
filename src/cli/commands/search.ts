import { Command } from 'commander';
import { withApp } from '../utils/app.js';
import { ProgressIndicator } from '../utils/progress.js';
import { formatCliError, parsePositiveInt, parseScore, validateQueryString } from '../utils/validation.js';
import { ValidationError } from '../../utils/errors.js';
import { TextProcessor } from '../../utils/text-processing.js';
import { RetrievedChunk } from '../../types/search.js';

interface SearchOptions {
  configPath?: string;
  limit?: number;
  minScore?: number;
  document?: string[];
  format: string;
}

export function createSearchCommand(): Command {
  return new Command('search')
    .description('Retrieve the chunks most similar to a query')
    .argument('<query>', 'Search query text')
    .option('-l, --limit <number>', 'Maximum number of results', parsePositiveInt('Limit', 100))
    .option('-s, --min-score <number>', 'Minimum cosine similarity (-1 to 1)', parseScore)
    .option('-d, --document <id...>', 'Restrict the search to these document ids')
    .option('--format <format>', 'Output format (table|json)', 'table')
    .option('--config-path <path>', 'Path to configuration file')
    .action(async (query: string, options: SearchOptions) => {
      try {
        await search(query, options);
      } catch (error) {
        console.error(formatCliError(error));
        process.exit(1);
      }
    });
}

async function search(rawQuery: string, options: SearchOptions): Promise<void> {
  const query = validateQueryString(rawQuery);
  if (options.format !== 'table' && options.format !== 'json') {
    throw new ValidationError('Format must be either table or json');
  }
  const asJson = options.format === 'json';

  await withApp(options.configPath, async app => {
    const progress = asJson ? undefined : new ProgressIndicator('Searching documents...');
    progress?.start();

    let results: RetrievedChunk[];
    try {
      results = await app.retriever.retrieve(query, {
        k: options.limit,
        minScore: options.minScore,
        documentIds: options.document,
      });
    } catch (error) {
      progress?.fail('Search failed');
      throw error;
    }
    progress?.stop(`Found ${results.length} result${results.length === 1 ? '' : 's'}`);

    if (asJson) {
      console.log(JSON.stringify(results, null, 2));
      return;
    }

    console.log('');
    if (results.length === 0) {
      console.log('🤷 No matching chunks. Add documents with: ragrelay add <file>');
      return;
    }

    results.forEach((result, i) => {
      console.log(`${i + 1}. 📄 ${result.filename} #${result.chunkIndex}  score ${result.score.toFixed(3)}`);
      console.log(`   🆔 ${result.documentId} / chunk ${result.chunkId}`);
      console.log(`   ${TextProcessor.truncate(result.text.replace(/\s+/g, ' '), 200)}`);
      console.log('');
    });
  });
}
