import { Command } from 'commander';
import { ConfigManager } from '../../utils/config.js';
import { RagConfigInput, RagConfigSchema, EmbeddingBackend, GenerationProviderName } from '../../types/config.js';
import { ProviderFactory } from '../../providers/factory.js';
import { ProgressIndicator } from '../utils/progress.js';
import { promptChoice, promptConfirm, promptSecure, promptWithDefault } from '../utils/input.js';
import { formatCliError, parsePositiveInt } from '../utils/validation.js';

interface InitOptions {
  configPath?: string;
  force?: boolean;
  yes?: boolean;
}

export function createInitCommand(): Command {
  return new Command('init')
    .description('Create a configuration file with interactive setup')
    .option('--config-path <path>', 'Path to configuration file')
    .option('--force', 'Overwrite existing configuration')
    .option('-y, --yes', 'Write the default configuration without prompting')
    .action(async (options: InitOptions) => {
      try {
        await initializeConfiguration(options);
      } catch (error) {
        console.error(formatCliError(error));
        process.exit(1);
      }
    });
}

async function initializeConfiguration(options: InitOptions): Promise<void> {
  console.log('🚀 ragrelay configuration setup');
  console.log('');

  const configManager = new ConfigManager(options.configPath);

  if (configManager.exists() && !options.force) {
    if (options.yes) {
      console.log(`Configuration already exists at ${configManager.getConfigPath()} (use --force to overwrite).`);
      return;
    }
    const overwrite = await promptConfirm('Configuration already exists. Do you want to overwrite it?', false);
    if (!overwrite) {
      console.log('Configuration setup cancelled.');
      return;
    }
  }

  const config: RagConfigInput = options.yes ? {} : await promptConfiguration();

  const progress = new ProgressIndicator('Saving configuration...');
  progress.start();
  try {
    await configManager.save(config);
    progress.stop(`Configuration saved to ${configManager.getConfigPath()}`);
  } catch (error) {
    progress.fail('Failed to save configuration');
    throw error;
  }

  if (!options.yes && (await promptConfirm('Would you like to check the generation providers now?', true))) {
    await testProviders(config);
  }

  console.log('');
  console.log('✅ Setup complete!');
  console.log('');
  console.log('Next steps:');
  console.log('  1. Add a document: ragrelay add <file>');
  console.log('  2. Search documents: ragrelay search "<query>"');
  console.log('  3. Start the API: ragrelay serve');
  console.log('');
}

async function promptConfiguration(): Promise<RagConfigInput> {
  const priority = await promptChoice<GenerationProviderName[]>(
    '🔧 Which generation providers should be used?',
    [
      { label: 'Ollama first, OpenAI fallback (Recommended)', value: ['ollama', 'openai'] },
      { label: 'Ollama only', value: ['ollama'], description: 'Fully local' },
      { label: 'OpenAI only', value: ['openai'] },
    ],
    0
  );
  console.log('');

  const config: RagConfigInput = { generation: { priority }, providers: {} };
  const providers: NonNullable<RagConfigInput['providers']> = {};

  if (priority.includes('ollama')) {
    console.log('📋 Ollama');
    providers.ollama = {
      baseUrl: await promptWithDefault('Ollama URL', 'http://127.0.0.1:11434'),
      model: await promptWithDefault('Chat model', 'llama3.1:8b'),
    };
    console.log('');
  }

  if (priority.includes('openai')) {
    console.log('📋 OpenAI');
    const apiKey = await promptSecure('OpenAI API key (leave empty to read OPENAI_API_KEY): ');
    providers.openai = {
      apiKey: apiKey.length > 0 ? apiKey : undefined,
      model: await promptWithDefault('Chat model', 'gpt-4o-mini'),
    };
    console.log('');
  }
  config.providers = providers;

  const backend = await promptChoice<EmbeddingBackend>(
    '🔢 Which embedding backend should be used?',
    [
      { label: 'Local hashing (Recommended)', value: 'hash', description: 'No model or network needed' },
      { label: 'Ollama', value: 'ollama', description: 'Uses the Ollama embedding model' },
      { label: 'OpenAI', value: 'openai', description: 'Requires an API key' },
    ],
    0
  );
  config.embedding = { backend };
  console.log('');

  console.log('📋 Document processing');
  const toChunkSize = parsePositiveInt('Chunk size', 10_000);
  const chunkSize = toChunkSize(await promptWithDefault('Chunk size in characters', '500'));
  const overlap = Number(await promptWithDefault('Overlap in characters', '50'));
  config.chunking = { chunkSize, overlap };

  return config;
}

async function testProviders(input: RagConfigInput): Promise<void> {
  const config = RagConfigSchema.parse(input);
  console.log('');
  console.log('🧪 Checking providers...');

  for (const name of config.generation.priority) {
    const provider = ProviderFactory.createGenerationProvider(name, config);
    if (!provider) {
      console.log(`⚠️  ${name}: not configured`);
      continue;
    }

    const progress = new ProgressIndicator(`Contacting ${name}...`);
    progress.start();
    try {
      const ok = await provider.checkHealth(AbortSignal.timeout(config.generation.healthCheckTimeoutMs));
      if (ok) {
        progress.stop(`${name}: reachable (${provider.model})`);
      } else {
        progress.fail(`${name}: not reachable`);
      }
    } catch (error) {
      progress.fail(`${name}: ${formatCliError(error)}`);
    }
  }
}
