import { access, readFile, writeFile } from 'node:fs/promises';
import { isAbsolute, join } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';

/**
 * Configuration error with context
 */
export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly code: 'PARSE_ERROR' | 'VALIDATION_ERROR' | 'IO_ERROR' | 'INVALID_TYPE',
        public readonly path?: string,
        public override readonly cause?: Error
    ) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Validation function type
 */
export type ConfigValidator<T> = (config: T) => boolean | string | Promise<boolean | string>;

/**
 * Configuration manager options
 */
export interface ConfigManagerOptions<T extends object> {
    /** File name (relative to cwd) or absolute path */
    fileName: string;
    /** Default configuration */
    defaultConfig: T;
    /** Custom validator function */
    validator?: ConfigValidator<T>;
    /** Environment-specific config override file (e.g., 'ping.dev.yaml') */
    envFile?: string;
    /** Number of spaces for YAML formatting (default: 2) */
    spaces?: number;
    /** Silent mode - suppress console logs */
    silent?: boolean;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merges two objects.
 * Sources overwrite target. Arrays are replaced, not merged.
 */
function deepMerge(target: unknown, source: unknown): unknown {
    if (!isPlainObject(target) || !isPlainObject(source)) {
        return source;
    }

    const output: PlainObject = { ...target };
    for (const key of Object.keys(source)) {
        output[key] = key in target ? deepMerge(target[key], source[key]) : source[key];
    }
    return output;
}

/**
 * Validates the config against the default config types.
 */
function validateConfigTypes(config: unknown, defaults: unknown, path = ''): string[] {
    const errors: string[] = [];

    if (!isPlainObject(defaults) || !isPlainObject(config)) return errors;

    for (const key of Object.keys(defaults)) {
        if (!(key in config)) continue;

        const defaultVal = defaults[key];
        const configVal = config[key];
        const currentPath = path ? `${path}.${key}` : key;

        if (defaultVal === null || configVal === null) continue; // Skip null checks

        if (typeof defaultVal !== typeof configVal || Array.isArray(defaultVal) !== Array.isArray(configVal)) {
            const actual = Array.isArray(configVal) ? 'array' : typeof configVal;
            const expected = Array.isArray(defaultVal) ? 'array' : typeof defaultVal;
            errors.push(`Expected type ${expected} for '${currentPath}', got ${actual}`);
        } else if (isPlainObject(defaultVal)) {
            errors.push(...validateConfigTypes(configVal, defaultVal, currentPath));
        }
    }

    return errors;
}

function hasDefaultShape<T extends object>(config: unknown, defaults: T): config is T {
    return isPlainObject(config) && validateConfigTypes(config, defaults).length === 0;
}

function resolvePath(fileName: string): string {
    return isAbsolute(fileName) ? fileName : join(process.cwd(), fileName);
}

async function fileExists(path: string): Promise<boolean> {
    try {
        await access(path);
        return true;
    } catch {
        return false;
    }
}

/**
 * Configuration Manager Class
 * Loads a YAML file over defaults, with validation and environment overrides
 */
export class ConfigManager<T extends object> {
    private config: T;
    private readonly defaultConfig: T;
    private readonly configPath: string;
    private readonly envPath?: string;
    private readonly validator?: ConfigValidator<T>;
    private readonly spaces: number;
    private readonly silent: boolean;

    constructor(options: ConfigManagerOptions<T>) {
        this.defaultConfig = options.defaultConfig;
        this.configPath = resolvePath(options.fileName);
        this.envPath = options.envFile ? resolvePath(options.envFile) : undefined;
        this.validator = options.validator;
        this.spaces = options.spaces ?? 2;
        this.silent = options.silent ?? false;
        this.config = { ...this.defaultConfig };
    }

    /**
     * Initialize and load configuration
     */
    async load(): Promise<T> {
        try {
            // Load base config
            let merged = deepMerge(this.defaultConfig, await this.loadFromFile(this.configPath, true));

            // Load environment-specific overrides if specified
            if (this.envPath && (await fileExists(this.envPath))) {
                merged = deepMerge(merged, await this.loadFromFile(this.envPath, false));
                if (!this.silent) {
                    console.log(`Applied environment config from ${this.envPath}`);
                }
            }

            this.config = await this.validate(merged, this.configPath);
            return this.config;
        } catch (error) {
            if (error instanceof ConfigError) throw error;
            throw new ConfigError(
                'Failed to load configuration',
                'IO_ERROR',
                this.configPath,
                error instanceof Error ? error : undefined
            );
        }
    }

    /**
     * Load the raw YAML object stored in a file
     */
    private async loadFromFile(path: string, createIfMissing: boolean): Promise<PlainObject> {
        if (!(await fileExists(path))) {
            if (createIfMissing) {
                if (!this.silent) {
                    console.log(`Creating default configuration: ${path}`);
                }
                await writeFile(path, stringifyYaml(this.defaultConfig, null, this.spaces), 'utf-8');
            }
            return {};
        }

        if (!this.silent) {
            console.log(`Loading configuration from ${path}`);
        }

        const content = await readFile(path, 'utf-8');

        // Handle empty or whitespace-only files
        if (content.trim().length === 0) {
            if (!this.silent) {
                console.warn(`Config file is empty, using defaults`);
            }
            return {};
        }

        let parsed: unknown;
        try {
            parsed = parseYaml(content);
        } catch (error) {
            throw new ConfigError(
                `Failed to parse YAML`,
                'PARSE_ERROR',
                path,
                error instanceof Error ? error : undefined
            );
        }

        if (!isPlainObject(parsed)) {
            throw new ConfigError(
                `Config file is invalid (not an object)`,
                'INVALID_TYPE',
                path
            );
        }
        return parsed;
    }

    /**
     * Checks a merged config against the default types and the custom validator
     */
    private async validate(candidate: unknown, path?: string): Promise<T> {
        if (!hasDefaultShape(candidate, this.defaultConfig)) {
            const typeErrors = validateConfigTypes(candidate, this.defaultConfig);
            throw new ConfigError(
                `Type validation failed: ${typeErrors.join(', ')}`,
                'VALIDATION_ERROR',
                path
            );
        }

        if (this.validator) {
            const result = await this.validator(candidate);
            if (typeof result === 'string') {
                throw new ConfigError(`Custom validation failed: ${result}`, 'VALIDATION_ERROR', path);
            }
            if (result === false) {
                throw new ConfigError('Custom validation failed', 'VALIDATION_ERROR', path);
            }
        }

        return candidate;
    }

    /**
     * Get current configuration
     */
    get(): T {
        return { ...this.config };
    }

    /**
     * Get a specific config value by path (e.g., 'server.port')
     * Supports both top-level keys and dot notation for nested values
     */
    getValue(path: string): unknown {
        let value: unknown = this.config;
        for (const key of path.split('.')) {
            if (isPlainObject(value) && key in value) {
                value = value[key];
            } else {
                return undefined;
            }
        }
        return value;
    }

    /**
     * Update configuration (in memory and optionally save to file)
     */
    async update(updates: Partial<T>, saveToFile = true): Promise<T> {
        this.config = await this.validate(deepMerge(this.config, updates));

        if (saveToFile) {
            await this.save();
        }

        return this.config;
    }

    /**
     * Save current configuration to file
     */
    async save(path?: string): Promise<void> {
        const targetPath = path ? resolvePath(path) : this.configPath;
        try {
            await writeFile(targetPath, stringifyYaml(this.config, null, this.spaces), 'utf-8');
            if (!this.silent) {
                console.log(`Configuration saved to ${targetPath}`);
            }
        } catch (error) {
            throw new ConfigError(
                'Failed to save configuration',
                'IO_ERROR',
                targetPath,
                error instanceof Error ? error : undefined
            );
        }
    }

    /**
     * Reset configuration to defaults
     */
    async reset(saveToFile = true): Promise<T> {
        this.config = { ...this.defaultConfig };
        if (saveToFile) {
            await this.save();
        }
        return this.config;
    }
}
