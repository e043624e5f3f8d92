import chalk from 'chalk';
import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { dirname, resolve } from 'path';

export interface InitCommandOptions {
  configPath?: string;
  homeDir?: string;
  logger?: (...args: unknown[]) => void;
}

function expandTilde(pathValue: string, homeDirectory: string): string {
  if (pathValue === '~') {
    return homeDirectory;
  }
  if (pathValue.startsWith('~/')) {
    return resolve(homeDirectory, pathValue.slice(2));
  }
  return pathValue;
}

function resolveConfigPath(configPath: string | undefined, homeDirectory: string): string {
  if (configPath) {
    return expandTilde(configPath, homeDirectory);
  }
  return resolve(homeDirectory, '.starsift', 'config.yaml');
}

export const CONFIG_TEMPLATE = `# starsift configuration
# String values may reference the environment: env:NAME, $NAME or \${NAME}

analysis:
  # Leave empty to use the built-in space-science vocabulary
  keywords: []
  min_claim_length: 30
  max_snippet_chars: 400

scoring:
  threshold: 3.0
  weights:
    keyword: 2.0
    numeric_bonus: 3.0
    length_bonus: 1.0
    claim_bonus: 1.5
  numeric_threshold: 2
  min_word_count_for_bonus: 20

sources:
  enabled: [local, arxiv, nasa_apod]   # local | arxiv | nasa_apod | nasa_mission
  samples_dir: data/samples
  arxiv:
    demo_mode: false                   # or set ARXIV_DEMO_MODE=1
    query: "all:exoplanet"
    max_results: 5
  nasa:
    demo_mode: false                   # or set NASA_DEMO_MODE=1
    api_key: env:NASA_API_KEY
    mission: JWST

summarizer:
  provider: google
  # Without a key summaries are built locally from claims and keywords
  api_key: env:GEMINI_API_KEY
  model: gemini-2.5-flash

storage:
  memory_path: data/memory.json
  output_dir: data/demo_outputs
`;

export async function initCommand(options: InitCommandOptions = {}): Promise<void> {
  const log = options.logger ?? console.log;
  const homeDirectory = options.homeDir ?? homedir();

  const configPath = resolveConfigPath(options.configPath, homeDirectory);
  const configDir = dirname(configPath);

  if (!existsSync(configDir)) {
    mkdirSync(configDir, { recursive: true });
    log(chalk.green('Created directory:'), configDir);
  }

  if (existsSync(configPath)) {
    log(chalk.yellow('Config already exists at:'), configPath);
    log(chalk.yellow('Run with --config <path> to use a different location.'));
    return;
  }

  writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
  log(chalk.green('Created config file:'), configPath);
  log('');
  log(chalk.cyan('Next steps:'));
  log('  1. Edit', configPath);
  log('  2. Set GEMINI_API_KEY and NASA_API_KEY, or keep the demo fallbacks');
  log('  3. Run', chalk.green('starsift run --demo'));
}
