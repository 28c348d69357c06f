import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { Command } from 'commander';
import { stringify as stringifyYaml } from 'yaml';
import { detectPlatform, getDefaultConfigPath, getShellgateHome } from '../config/defaults.js';
import { ConfigSchema, type Platform, PlatformSchema } from '../config/schema.js';

interface InitOptions {
	platform?: string;
	force?: boolean;
}

interface RunInitResult {
	home: string;
	configPath: string;
	platform: Platform;
}

function camelToSnake(key: string): string {
	return key.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

function convertKeysToSnakeCase(value: unknown): unknown {
	if (Array.isArray(value)) {
		return value.map(convertKeysToSnakeCase);
	}
	if (value !== null && typeof value === 'object') {
		const result: Record<string, unknown> = {};
		for (const [key, val] of Object.entries(value)) {
			result[camelToSnake(key)] = convertKeysToSnakeCase(val);
		}
		return result;
	}
	return value;
}

/** Default configuration with the platform pinned, as the YAML the loader reads. */
export function renderDefaultConfig(platform: Platform): string {
	const config = ConfigSchema.parse({ sandbox: { platform } });
	return stringifyYaml(convertKeysToSnakeCase(config));
}

export function runInit(options: InitOptions = {}): RunInitResult {
	const home = getShellgateHome();
	mkdirSync(join(home, 'logs'), { recursive: true });

	const platform = options.platform === undefined ? detectPlatform() : PlatformSchema.parse(options.platform);
	const configPath = getDefaultConfigPath();
	if (existsSync(configPath) && !options.force) {
		throw new Error(`Config already exists at ${configPath}. Use --force to overwrite.`);
	}

	mkdirSync(dirname(configPath), { recursive: true });
	writeFileSync(configPath, renderDefaultConfig(platform), 'utf-8');
	return { home, configPath, platform };
}

export function registerInitCommand(program: Command): void {
	program
		.command('init')
		.description('Initialize the shellgate home directory and default configuration')
		.option('--platform <platform>', 'bsd|gnu (default: detected from the host)')
		.option('--force', 'Overwrite existing config')
		.action((options: InitOptions) => {
			try {
				const result = runInit(options);
				process.stdout.write(`Initialized shellgate at ${result.home}\n`);
				process.stdout.write(`Config: ${result.configPath} (platform: ${result.platform})\n`);
				process.stdout.write(`Next: run "shellgate regress --offline"\n`);
			} catch (error) {
				const message = error instanceof Error ? error.message : String(error);
				process.stderr.write(`Error: ${message}\n`);
				process.exitCode = 1;
			}
		});
}
