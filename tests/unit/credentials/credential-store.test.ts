/**
 * Tests for the credential inventory
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CredentialStore } from '../../../src/credentials/credential-store.js';
import { ConfigError } from '../../../src/utils/error-utils.js';

const tempDir = path.join(os.tmpdir(), `ngv-credentials-test-${process.pid}`);

beforeAll(() => fs.mkdirSync(tempDir, { recursive: true }));
afterAll(() => fs.rmSync(tempDir, { recursive: true, force: true }));

describe('CredentialStore', () => {
  const store = new CredentialStore([
    { id: 'c1', name: 'Team Slack', type: 'slackApi' },
    { id: 'c2', name: 'Shared', type: 'httpBasicAuth' },
    { id: 'c3', name: 'Shared', type: 'httpHeaderAuth' },
  ]);

  it('should find a credential by id', () => {
    expect(store.find({ id: 'c1' })).toEqual({ id: 'c1', name: 'Team Slack', type: 'slackApi' });
  });

  it('should prefer the id over the name', () => {
    expect(store.find({ id: 'c1', name: 'Shared' })?.id).toBe('c1');
    expect(store.find({ id: 'c9', name: 'Team Slack' })).toBeUndefined();
  });

  it('should prefer the expected type among credentials sharing a name', () => {
    expect(store.find({ name: 'Shared' }, 'httpHeaderAuth')?.id).toBe('c3');
    expect(store.find({ name: 'Shared' }, 'slackApi')?.id).toBe('c2');
  });

  it('should return undefined for an empty reference', () => {
    expect(store.find({})).toBeUndefined();
  });

  it('should count credentials by id', () => {
    expect(store.size).toBe(3);
  });

  describe('loadFromFile', () => {
    it('should load a plain array', () => {
      const file = path.join(tempDir, 'array.json');
      fs.writeFileSync(file, JSON.stringify([{ id: 'a', name: 'Orders DB', type: 'postgres' }]));

      expect(CredentialStore.loadFromFile(file).find({ id: 'a' })?.type).toBe('postgres');
    });

    it('should load a credentials object', () => {
      const file = path.join(tempDir, 'object.json');
      fs.writeFileSync(file, JSON.stringify({ credentials: [{ id: 'b', name: 'OpenAI', type: 'openAiApi' }] }));

      expect(CredentialStore.loadFromFile(file).size).toBe(1);
    });

    it('should throw ConfigError for unreadable JSON', () => {
      const file = path.join(tempDir, 'broken.json');
      fs.writeFileSync(file, '{ not json');

      expect(() => CredentialStore.loadFromFile(file)).toThrow(ConfigError);
      expect(() => CredentialStore.loadFromFile(file)).toThrow(`Cannot read credentials from ${file}: `);
    });

    it('should throw ConfigError for records without a type', () => {
      const file = path.join(tempDir, 'untyped.json');
      fs.writeFileSync(file, JSON.stringify([{ id: 'a', name: 'No type' }]));

      expect(() => CredentialStore.loadFromFile(file)).toThrow(`Invalid credentials file ${file}: `);
    });
  });
});
