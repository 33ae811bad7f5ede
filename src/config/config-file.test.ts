import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import { getConfigPath, loadConfigSource } from './config-file.js';
import { ConfigError } from '../errors.js';

// Mock the fs and os modules
vi.mock('fs');
vi.mock('os');

const CONFIG_PATH = '/home/testuser/.poznote.conf';

describe('loadConfigSource', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.mocked(os.homedir).mockReturnValue('/home/testuser');
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should look for .poznote.conf in the home directory', () => {
    expect(getConfigPath()).toBe(CONFIG_PATH);
  });

  it('should parse quoted and unquoted values from the config file', () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue(
      [
        'POZNOTE_URL="https://notes.example.test"',
        'POZNOTE_USER=alice',
        "POZNOTE_PASS='test-secret'",
        'POZNOTE_WORKSPACE="Clip"',
        'UNRELATED=ignored',
      ].join('\n'),
    );

    const source = loadConfigSource(CONFIG_PATH, {});

    expect(fs.readFileSync).toHaveBeenCalledWith(CONFIG_PATH, 'utf-8');
    expect(source).toEqual({
      POZNOTE_URL: 'https://notes.example.test',
      POZNOTE_USER: 'alice',
      POZNOTE_PASS: 'test-secret',
      POZNOTE_WORKSPACE: 'Clip',
    });
  });

  it('should let environment variables override the file', () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue(
      'POZNOTE_USER=alice\nPOZNOTE_ADVANCED_FEATURES=false\n',
    );

    const source = loadConfigSource(CONFIG_PATH, {
      POZNOTE_USER: 'bob',
      POZNOTE_ADVANCED_FEATURES: 'true',
      HOME: '/home/testuser',
    });

    expect(source).toEqual({
      POZNOTE_USER: 'bob',
      POZNOTE_ADVANCED_FEATURES: 'true',
    });
  });

  it('should fall back to the environment when the file is missing', () => {
    vi.mocked(fs.existsSync).mockReturnValue(false);

    const source = loadConfigSource(CONFIG_PATH, {
      POZNOTE_URL: 'https://notes.example.test',
    });

    expect(source).toEqual({ POZNOTE_URL: 'https://notes.example.test' });
    expect(fs.readFileSync).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith(
      `[Info] Poznote config not found at: ${CONFIG_PATH}`,
    );
  });

  it('should raise a config error when the file cannot be read', () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockImplementation(() => {
      throw new Error('EACCES: permission denied');
    });

    let caught: unknown;
    try {
      loadConfigSource(CONFIG_PATH, {});
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      reason: 'unreadable-file',
      exitCode: 12,
      message: `Could not read ${CONFIG_PATH}: EACCES: permission denied`,
    });
  });
});
