import { mkdtempSync, rmSync } from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parse } from 'yaml';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError, ConfigManager, type ConfigManagerOptions } from '../../src/config/config-manager.js';

interface TestConfig {
    host: string;
    port: number;
    debug: boolean;
    tags: string[];
    logging: {
        level: string;
        verbose: boolean;
    };
}

const defaultConfig: TestConfig = {
    host: 'localhost',
    port: 8080,
    debug: false,
    tags: ['a', 'b'],
    logging: {
        level: 'info',
        verbose: false,
    },
};

let dir: string;

beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ping-config-'));
});

afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
});

function manager(options: Partial<ConfigManagerOptions<TestConfig>> = {}) {
    return new ConfigManager<TestConfig>({
        fileName: join(dir, 'config.yaml'),
        defaultConfig,
        silent: true,
        ...options,
    });
}

async function expectConfigError(promise: Promise<unknown>): Promise<ConfigError> {
    try {
        await promise;
    } catch (error) {
        if (error instanceof ConfigError) return error;
        throw error;
    }
    throw new Error('Expected a ConfigError');
}

describe('ConfigManager - Basic Operations', () => {
    it('should create config file with defaults on first load', async () => {
        const config = await manager().load();

        expect(config).toEqual(defaultConfig);
        expect(parse(await readFile(join(dir, 'config.yaml'), 'utf-8'))).toEqual(defaultConfig);
    });

    it('should merge a partial file over the defaults', async () => {
        await writeFile(join(dir, 'config.yaml'), 'port: 3000\nlogging:\n  level: debug\n');
        const config = await manager().load();

        expect(config.port).toBe(3000);
        expect(config.host).toBe('localhost');
        expect(config.logging).toEqual({ level: 'debug', verbose: false });
    });

    it('should replace arrays instead of merging them', async () => {
        await writeFile(join(dir, 'config.yaml'), 'tags:\n  - c\n');
        expect((await manager().load()).tags).toEqual(['c']);
    });

    it('should use defaults for an empty file', async () => {
        await writeFile(join(dir, 'config.yaml'), '   \n');
        expect(await manager().load()).toEqual(defaultConfig);
    });

    it('should read nested values by path', async () => {
        const configManager = manager();
        await configManager.load();
        expect(configManager.getValue('logging.level')).toBe('info');
        expect(configManager.getValue('logging.missing')).toBeUndefined();
        expect(configManager.getValue('port')).toBe(8080);
    });
});

describe('ConfigManager - Errors', () => {
    it('should reject a file that is not a mapping', async () => {
        await writeFile(join(dir, 'config.yaml'), '- a\n- b\n');
        const error = await expectConfigError(manager().load());
        expect(error.code).toBe('INVALID_TYPE');
    });

    it('should reject malformed YAML', async () => {
        await writeFile(join(dir, 'config.yaml'), 'logging: {level: info\n');
        const error = await expectConfigError(manager().load());
        expect(error.code).toBe('PARSE_ERROR');
    });

    it('should reject values of the wrong type', async () => {
        await writeFile(join(dir, 'config.yaml'), 'port: "eighty"\n');
        const error = await expectConfigError(manager().load());
        expect(error.code).toBe('VALIDATION_ERROR');
        expect(error.message).toBe("Type validation failed: Expected type number for 'port', got string");
    });

    it('should run the custom validator', async () => {
        await writeFile(join(dir, 'config.yaml'), 'port: 80\n');
        const error = await expectConfigError(
            manager({ validator: (config) => config.port >= 1024 || 'port must be unprivileged' }).load()
        );
        expect(error.code).toBe('VALIDATION_ERROR');
        expect(error.message).toBe('Custom validation failed: port must be unprivileged');
    });
});

describe('ConfigManager - Environment overrides', () => {
    it('should apply the env file on top of the base file', async () => {
        await writeFile(join(dir, 'config.yaml'), 'port: 3000\n');
        await writeFile(join(dir, 'config.dev.yaml'), 'debug: true\nlogging:\n  verbose: true\n');
        const config = await manager({ envFile: join(dir, 'config.dev.yaml') }).load();

        expect(config.port).toBe(3000);
        expect(config.debug).toBe(true);
        expect(config.logging).toEqual({ level: 'info', verbose: true });
    });

    it('should ignore a missing env file', async () => {
        const config = await manager({ envFile: join(dir, 'missing.yaml') }).load();
        expect(config).toEqual(defaultConfig);
    });
});

describe('ConfigManager - Updates', () => {
    it('should update and persist', async () => {
        const configManager = manager();
        await configManager.load();
        await configManager.update({ port: 9090 });

        expect(configManager.get().port).toBe(9090);
        expect((await manager().load()).port).toBe(9090);
    });

    it('should reject an update of the wrong type', async () => {
        const configManager = manager();
        await configManager.load();
        const error = await expectConfigError(configManager.update(JSON.parse('{"debug":"yes"}'), false));
        expect(error.code).toBe('VALIDATION_ERROR');
        expect(configManager.get().debug).toBe(false);
    });

    it('should save to another path', async () => {
        const configManager = manager();
        await configManager.load();
        await configManager.save(join(dir, 'copy.yaml'));
        expect(parse(await readFile(join(dir, 'copy.yaml'), 'utf-8'))).toEqual(defaultConfig);
    });

    it('should reset to defaults', async () => {
        const configManager = manager();
        await configManager.load();
        await configManager.update({ host: 'example.net' }, false);
        expect(await configManager.reset(false)).toEqual(defaultConfig);
    });
});
