import { describe, it, expect } from 'vitest';
import { loadSettings, parseCorsOrigins } from '../settings';

describe('loadSettings', () => {
  it('falls back to defaults on an empty environment', () => {
    const settings = loadSettings({});

    expect(settings).toEqual({
      apiPrefix: '/api/v1',
      projectName: 'AI Tutor',
      port: 8000,
      corsOrigins: ['*'],
      logLevel: 'INFO',
      firebase: { projectId: undefined, clientEmail: undefined, privateKey: undefined, storageBucket: undefined },
      gemini: { apiKey: undefined, model: 'gemini-1.5-flash', maxTokens: 2048, temperature: 0.7 },
      tts: { languageCode: 'en-US', voiceName: 'en-US-Neural2-A' },
    });
  });

  it('coerces numbers and normalises the log level', () => {
    const settings = loadSettings({ PORT: '9090', GEMINI_TEMPERATURE: '0.2', LOG_LEVEL: 'debug' });

    expect(settings.port).toBe(9090);
    expect(settings.gemini.temperature).toBe(0.2);
    expect(settings.logLevel).toBe('DEBUG');
  });

  it('treats blank values as unset', () => {
    expect(loadSettings({ GEMINI_API_KEY: '  ' }).gemini.apiKey).toBeUndefined();
  });

  it('falls back to defaults for empty variables that have one', () => {
    const settings = loadSettings({ PORT: '', GEMINI_MAX_TOKENS: ' ', GEMINI_MODEL: '', LOG_LEVEL: '' });

    expect(settings.port).toBe(8000);
    expect(settings.gemini.maxTokens).toBe(2048);
    expect(settings.gemini.model).toBe('gemini-1.5-flash');
    expect(settings.logLevel).toBe('INFO');
  });

  it('expands escaped newlines in the service account key', () => {
    const settings = loadSettings({ FIREBASE_PRIVATE_KEY: 'line-one\\nline-two' });
    expect(settings.firebase.privateKey).toBe('line-one\nline-two');
  });

  it('names every invalid variable', () => {
    expect(() => loadSettings({ PORT: 'abc', LOG_LEVEL: 'LOUD' })).toThrow(/^Invalid configuration: PORT: .+; LOG_LEVEL: .+$/);
  });
});

describe('parseCorsOrigins', () => {
  it('keeps the wildcard as is', () => {
    expect(parseCorsOrigins(' * ')).toEqual(['*']);
  });

  it('splits and trims a list, dropping blanks', () => {
    expect(parseCorsOrigins('http://localhost:3000, https://tutor.example.com,,')).toEqual([
      'http://localhost:3000',
      'https://tutor.example.com',
    ]);
  });
});
