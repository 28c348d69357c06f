export { detectPlatform, expandHome, getDefaultConfigPath, getShellgateHome } from './defaults.js';
export {
	ensureShellgateHome,
	getConfig,
	initConfig,
	loadConfig,
	resetConfig,
	resolvePlatform,
} from './loader.js';
export {
	ConfigSchema,
	type LogLevel,
	type Platform,
	PlatformSchema,
	type ShellgateConfig,
} from './schema.js';
