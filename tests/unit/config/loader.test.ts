/**
 * Tests for configuration loading and precedence
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  createValidateOptions,
  loadConfig,
  loadConfigFromPath,
  parseEnvironment,
  parseProfile,
} from '../../../src/config/loader.js';
import { getDefaultConfig } from '../../../src/config/defaults.js';
import { ConfigError } from '../../../src/utils/error-utils.js';

const ENV_KEYS = ['NGV_ENV', 'NGV_PROFILE', 'NGV_NODE_TYPES', 'NGV_CREDENTIALS', 'NODE_ENV'];

const tempDir = path.join(os.tmpdir(), `ngv-config-test-${process.pid}`);
const savedEnv = new Map<string, string | undefined>();

function writeFile(name: string, content: string): string {
  const file = path.join(tempDir, name);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content);
  return file;
}

beforeAll(() => fs.mkdirSync(tempDir, { recursive: true }));
afterAll(() => fs.rmSync(tempDir, { recursive: true, force: true }));

beforeEach(() => {
  for (const key of ENV_KEYS) {
    savedEnv.set(key, process.env[key]);
    delete process.env[key];
  }
});

afterEach(() => {
  for (const key of ENV_KEYS) {
    const value = savedEnv.get(key);
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
});

describe('parseEnvironment', () => {
  it('should accept names and aliases in any case', () => {
    expect(parseEnvironment('Production')).toBe('production');
    expect(parseEnvironment('prod')).toBe('production');
    expect(parseEnvironment('stage')).toBe('staging');
    expect(parseEnvironment('DEV')).toBe('development');
  });

  it('should return undefined for other values', () => {
    expect(parseEnvironment('test')).toBeUndefined();
  });
});

describe('parseProfile', () => {
  it('should accept only known profiles', () => {
    expect(parseProfile('ai-friendly')).toBe('ai-friendly');
    expect(parseProfile('loose')).toBeUndefined();
  });
});

describe('getDefaultConfig', () => {
  it('should return a fresh copy each time', () => {
    const first = getDefaultConfig();
    first.ignore.codes.push('NO_TRIGGER_NODE');
    first.nodeTypes.push('extra.json');

    expect(getDefaultConfig()).toEqual({
      environment: 'development',
      profile: 'runtime',
      nodeTypes: [],
      credentials: undefined,
      ignore: { codes: [], categories: [] },
    });
  });
});

describe('loadConfig', () => {
  it('should return defaults without a file, env or overrides', () => {
    expect(loadConfig()).toEqual(getDefaultConfig());
  });

  it('should read an explicit YAML file', () => {
    const file = writeFile(
      'explicit/validator.yaml',
      ['environment: production', 'profile: strict', 'ignore:', '  codes: [NO_TRIGGER_NODE]'].join('\n')
    );

    const config = loadConfig(undefined, file);

    expect(config.environment).toBe('production');
    expect(config.profile).toBe('strict');
    expect(config.ignore).toEqual({ codes: ['NO_TRIGGER_NODE'], categories: [] });
  });

  it('should throw for a missing explicit file', () => {
    const missing = path.join(tempDir, 'nope.yaml');

    expect(() => loadConfig(undefined, missing)).toThrow(`Config file not found: ${missing}`);
  });

  it('should let environment variables override the file', () => {
    const file = writeFile('env/validator.yaml', 'environment: production\nprofile: strict\n');
    process.env.NGV_ENV = 'staging';
    process.env.NGV_PROFILE = 'minimal';

    const config = loadConfig(undefined, file);

    expect(config.environment).toBe('staging');
    expect(config.profile).toBe('minimal');
  });

  it('should fall back to NODE_ENV and ignore values it does not know', () => {
    process.env.NODE_ENV = 'production';
    expect(loadConfig().environment).toBe('production');

    process.env.NODE_ENV = 'test';
    expect(loadConfig().environment).toBe('development');
  });

  it('should throw for an invalid NGV_ENV', () => {
    process.env.NGV_ENV = 'qa';

    expect(() => loadConfig()).toThrow('Invalid NGV_ENV "qa"; expected one of development, staging, production');
  });

  it('should throw for an invalid NGV_PROFILE', () => {
    process.env.NGV_PROFILE = 'loose';

    expect(() => loadConfig()).toThrow(ConfigError);
  });

  it('should split NGV_NODE_TYPES on commas', () => {
    process.env.NGV_NODE_TYPES = ' a.json, ,b.json ';

    expect(loadConfig().nodeTypes).toEqual(['a.json', 'b.json']);
  });

  it('should let CLI overrides win and accumulate lists', () => {
    const file = writeFile(
      'cli/validator.yaml',
      ['profile: strict', 'ignore:', '  codes: [NO_TRIGGER_NODE]', '  categories: [community-node]'].join('\n')
    );
    process.env.NGV_ENV = 'production';

    const config = loadConfig(
      { env: 'development', profile: 'runtime', ignore: ['OUTDATED_TYPE_VERSION'], ignoreCategory: ['community-node'] },
      file
    );

    expect(config.environment).toBe('development');
    expect(config.profile).toBe('runtime');
    expect(config.ignore).toEqual({
      codes: ['NO_TRIGGER_NODE', 'OUTDATED_TYPE_VERSION'],
      categories: ['community-node'],
    });
  });
});

describe('loadConfigFromPath', () => {
  it('should resolve relative paths against the file directory', () => {
    const file = writeFile(
      'paths/n8n-graph-validator.config.json',
      JSON.stringify({ nodeTypes: ['catalogs/custom.json'], credentials: '../creds.json' })
    );

    const config = loadConfigFromPath(file);

    expect(config.nodeTypes).toEqual([path.join(tempDir, 'paths', 'catalogs', 'custom.json')]);
    expect(config.credentials).toBe(path.join(tempDir, 'creds.json'));
  });

  it('should treat an empty file as an empty config', () => {
    const file = writeFile('empty/validator.yaml', '');

    expect(loadConfigFromPath(file)).toEqual({ nodeTypes: undefined, credentials: undefined });
  });

  it('should name the offending key of an invalid value', () => {
    const file = writeFile('invalid/validator.yaml', 'profile: loose\n');

    expect(() => loadConfigFromPath(file)).toThrow(`Invalid config file ${file} at profile: `);
  });

  it('should reject unknown keys', () => {
    const file = writeFile('unknown/validator.yaml', 'profil: strict\n');

    expect(() => loadConfigFromPath(file)).toThrow(ConfigError);
  });

  it('should wrap YAML syntax errors', () => {
    const file = writeFile('syntax/validator.yaml', 'profile: [strict\n');

    expect(() => loadConfigFromPath(file)).toThrow(`Cannot read config file ${file}: `);
  });
});

describe('createValidateOptions', () => {
  it('should use the built-in catalog when no extra catalogs are named', () => {
    const options = createValidateOptions(getDefaultConfig());

    expect(options.registry).toBeUndefined();
    expect(options.credentials).toBeUndefined();
    expect(options.environment).toBe('development');
    expect(options.profile).toBe('runtime');
  });

  it('should load extra catalogs and the credential inventory', () => {
    const catalog = writeFile(
      'options/widgets.json',
      JSON.stringify({
        nodeTypes: [
          { type: 'n8n-nodes-acme.widget', displayName: 'Widget', versions: [1], inputs: ['main'], outputs: ['main'], properties: [] },
        ],
      })
    );
    const credentials = writeFile('options/credentials.json', JSON.stringify([{ id: 'w1', name: 'Widget key', type: 'acmeApi' }]));

    const options = createValidateOptions({ ...getDefaultConfig(), nodeTypes: [catalog], credentials });

    expect(options.registry?.has('n8n-nodes-acme.widget')).toBe(true);
    expect(options.registry?.has('n8n-nodes-base.httpRequest')).toBe(true);
    expect(options.credentials?.find({ id: 'w1' })?.type).toBe('acmeApi');
  });
});
