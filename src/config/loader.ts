import { existsSync, mkdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { Result } from '../core/types.js';
import { detectPlatform, getDefaultConfigPath, getShellgateHome } from './defaults.js';
import { ConfigSchema, type Platform, type ShellgateConfig } from './schema.js';

/**
 * Resolves environment variable references in config values.
 * Supports ${ENV_VAR} syntax. Returns the value unchanged if not a reference.
 */
function resolveEnvVars(value: unknown): unknown {
	if (typeof value === 'string') {
		return value.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
			return process.env[varName] ?? '';
		});
	}
	if (Array.isArray(value)) {
		return value.map(resolveEnvVars);
	}
	if (isRecord(value)) {
		return resolveEnvVarsInObject(value);
	}
	return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function resolveEnvVarsInObject(obj: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, val] of Object.entries(obj)) {
		result[key] = resolveEnvVars(val);
	}
	return result;
}

/**
 * Converts YAML snake_case keys to camelCase for TypeScript config.
 */
function snakeToCamel(str: string): string {
	return str.replace(/_([a-z])/g, (_match, letter: string) => letter.toUpperCase());
}

function convertKeysToCamelCase(obj: unknown): unknown {
	if (Array.isArray(obj)) {
		return obj.map(convertKeysToCamelCase);
	}
	if (isRecord(obj)) {
		const result: Record<string, unknown> = {};
		for (const [key, val] of Object.entries(obj)) {
			result[snakeToCamel(key)] = convertKeysToCamelCase(val);
		}
		return result;
	}
	return obj;
}

/**
 * Loads and validates the shellgate configuration.
 * Looks for config at the given path, or falls back to defaults.
 */
export function loadConfig(configPath?: string): Result<ShellgateConfig> {
	const path = configPath ?? getDefaultConfigPath();

	let rawConfig: unknown = {};

	if (existsSync(path)) {
		try {
			const parsed: unknown = parseYaml(readFileSync(path, 'utf-8'));
			if (isRecord(parsed)) {
				rawConfig = parsed;
			}
		} catch (err) {
			return {
				ok: false,
				error: new Error(
					`Failed to parse config at ${path}: ${err instanceof Error ? err.message : String(err)}`,
				),
			};
		}
	}

	const resolvedConfig = resolveEnvVars(convertKeysToCamelCase(rawConfig));
	const result = ConfigSchema.safeParse(resolvedConfig);

	if (!result.success) {
		const issues = result.error.issues.map(
			(issue) => `  - ${issue.path.join('.')}: ${issue.message}`,
		);
		return {
			ok: false,
			error: new Error(`Invalid configuration:\n${issues.join('\n')}`),
		};
	}

	return { ok: true, value: result.data };
}

/** Declared platform, or the host's when the config leaves it empty. */
export function resolvePlatform(config: ShellgateConfig): Platform {
	return config.sandbox.platform === '' ? detectPlatform() : config.sandbox.platform;
}

/**
 * Ensures the shellgate home directory exists.
 */
export function ensureShellgateHome(): string {
	const home = getShellgateHome();
	mkdirSync(join(home, 'logs'), { recursive: true });
	return home;
}

// Singleton config holder
let _config: ShellgateConfig | null = null;

/**
 * Initializes and returns the config. Call once at startup.
 */
export function initConfig(configPath?: string): Result<ShellgateConfig> {
	const result = loadConfig(configPath);
	if (result.ok) {
		_config = result.value;
	}
	return result;
}

/**
 * Gets the loaded config. Throws if not initialized.
 */
export function getConfig(): ShellgateConfig {
	if (_config === null) {
		throw new Error('Config not initialized. Call initConfig() first.');
	}
	return _config;
}

/**
 * Resets config (for testing).
 */
export function resetConfig(): void {
	_config = null;
}
