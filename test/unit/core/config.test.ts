/**
 * Unit tests for service config resolution
 */

import { expect } from 'chai';
import { readFile, stat, writeFile } from 'fs/promises';
import path from 'path';

import { loadConfigFile, resolveServiceConfig, saveConfig } from '../../../src/core/config.js';
import { ConfigError } from '../../../src/core/errors.js';
import { makeTempDir, removeDir } from '../../helpers/fixtures.js';

describe('service config', () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    configPath = path.join(dir, 'config', 'config.json');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  describe('loadConfigFile', () => {
    it('returns null when the file is missing', async () => {
      expect(await loadConfigFile(configPath)).to.be.null;
    });

    it('returns null when the file does not match the schema', async () => {
      const file = path.join(dir, 'bad.json');
      await writeFile(file, JSON.stringify({ base_url: 42 }));

      expect(await loadConfigFile(file)).to.be.null;
    });
  });

  describe('resolveServiceConfig', () => {
    it('prefers flags over env over the config file', async () => {
      await saveConfig({ base_url: 'https://file.example.test', api_key: 'file-key' }, configPath);
      const env = { DOCMIRROR_BASE_URL: 'https://env.example.test', DOCMIRROR_API_KEY: 'env-key' };

      expect(await resolveServiceConfig({}, {}, configPath)).to.deep.equal({
        baseUrl: 'https://file.example.test',
        apiKey: 'file-key',
      });
      expect(await resolveServiceConfig({}, env, configPath)).to.deep.equal({
        baseUrl: 'https://env.example.test',
        apiKey: 'env-key',
      });
      expect(await resolveServiceConfig({ apiKey: 'flag-key' }, env, configPath)).to.deep.equal({
        baseUrl: 'https://env.example.test',
        apiKey: 'flag-key',
      });
    });

    it('names everything that is missing', async () => {
      try {
        await resolveServiceConfig({}, {}, configPath);
        expect.fail('expected a ConfigError');
      } catch (error) {
        expect(error).to.be.instanceOf(ConfigError);
        expect((error as ConfigError).message).to.equal(
          'Missing base URL (--base-url or DOCMIRROR_BASE_URL) and API key (--api-key or DOCMIRROR_API_KEY)'
        );
      }
    });

    it('names only the missing key', async () => {
      try {
        await resolveServiceConfig({ baseUrl: 'https://docs.example.test' }, {}, configPath);
        expect.fail('expected a ConfigError');
      } catch (error) {
        expect((error as ConfigError).message).to.equal('Missing API key (--api-key or DOCMIRROR_API_KEY)');
      }
    });
  });

  describe('saveConfig', () => {
    it('merges with the existing file and keeps it private', async () => {
      await saveConfig({ base_url: 'https://docs.example.test' }, configPath);
      await saveConfig({ api_key: 'test-key' }, configPath);

      expect(JSON.parse(await readFile(configPath, 'utf-8'))).to.deep.equal({
        version: 1,
        base_url: 'https://docs.example.test',
        api_key: 'test-key',
      });
      expect((await stat(configPath)).mode & 0o777).to.equal(0o600);
    });
  });
});
