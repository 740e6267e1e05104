import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadConfig, resolveConfig } from '@/lib/config';
import { ConfigError } from '@/lib/errors';

describe('resolveConfig', () => {
  it('fills defaults', () => {
    const config = resolveConfig();

    expect(config.seed).toBe(42);
    expect(config.evalRatio).toBe(0.3);
    expect(config.marketWindowDays).toBe(3);
    expect(config.adverseReturnThreshold).toBe(-0.02);
    expect(config.labelStrategy).toBe('human-then-weak');
    expect(config.documentAggregation).toBe('mean');
    expect(config.associationTest).toBe('point-biserial');
    expect(config.hedgingLexiconPath).toBeNull();
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(resolveConfig({ seed: 1 }))).toBe(true);
  });

  it('lists every invalid path', () => {
    expect(() => resolveConfig({ evalRatio: 1.5, readabilityFormula: 'smog' })).toThrow(ConfigError);
    expect(() => resolveConfig({ evalRatio: 1.5 })).toThrow(/evalRatio/);
    expect(() => resolveConfig({ marketWindowDays: 0 })).toThrow(/marketWindowDays/);
  });

  it('rejects passages longer than the encoder sequence', () => {
    expect(() => resolveConfig({ maxPassageTokens: 300, maxSequenceLength: 256 })).toThrow(
      'Invalid pipeline configuration: maxPassageTokens: must not exceed maxSequenceLength (256)',
    );
    expect(resolveConfig({ maxPassageTokens: 128, maxSequenceLength: 128 }).maxPassageTokens).toBe(128);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-'));
    fs.writeFileSync(path.join(dir, 'config.json'), JSON.stringify({ seed: 7, evalRatio: 0.25, encoderEpochs: 4 }));
    fs.writeFileSync(path.join(dir, 'broken.json'), '{ "seed": ');
    fs.writeFileSync(path.join(dir, 'list.json'), '[1, 2]');
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads the bundled default config', () => {
    const config = loadConfig(path.resolve('data/default-config.json'), {});

    expect(config.seed).toBe(42);
    expect(config.readabilityFormula).toBe('gunning-fog');
  });

  it('layers environment variables over the file and explicit overrides over both', () => {
    const config = loadConfig(
      path.join(dir, 'config.json'),
      { EVASION_SEED: '11', EVASION_LABEL_STRATEGY: 'weak', EVASION_EVAL_RATIO: ' ' },
      { encoderEpochs: 2 },
    );

    expect(config.seed).toBe(11);
    expect(config.labelStrategy).toBe('weak');
    expect(config.evalRatio).toBe(0.25);
    expect(config.encoderEpochs).toBe(2);
  });

  it('rejects a non-numeric environment value', () => {
    expect(() => loadConfig(undefined, { EVASION_SEED: 'abc' })).toThrow(ConfigError);
  });

  it('rejects unreadable, malformed and non-object files', () => {
    expect(() => loadConfig(path.join(dir, 'missing.json'), {})).toThrow(/cannot read/);
    expect(() => loadConfig(path.join(dir, 'broken.json'), {})).toThrow(/not valid JSON/);
    expect(() => loadConfig(path.join(dir, 'list.json'), {})).toThrow(/must contain a JSON object/);
  });
});
