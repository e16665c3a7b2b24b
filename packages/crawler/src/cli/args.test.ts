import { describe, it, expect } from 'vitest';
import { parseArgs, runArgsSchema, toConfigInput } from './args.js';
import { toSpider } from './load-spider.js';
import { Spider } from '../spider/spider.js';

class ExampleSpider extends Spider {
  entry() {
    return 'https://example.com';
  }
}

describe('parseArgs', () => {
  it('collects the command, positionals and options', () => {
    expect(
      parseArgs(['run', './spider.js', '--workers=4', '--retryTimes', '2', '--dry']),
    ).toEqual({
      command: 'run',
      positionals: ['./spider.js'],
      options: { workers: '4', retryTimes: '2', dry: 'true' },
    });
  });

  it('treats a missing command and -h as help', () => {
    expect(parseArgs([]).command).toBe('help');
    expect(parseArgs(['-h']).command).toBe('help');
  });
});

describe('runArgsSchema', () => {
  it('coerces numeric options and maps them to config fields', () => {
    const parsed = runArgsSchema.parse({
      module: './spider.js',
      workers: '4',
      downloadDelay: '250',
      retryTimes: '0',
      timeout: '5000',
      logLevel: 'DEBUG',
    });

    expect(parsed.logLevel).toBe('debug');
    expect(toConfigInput(parsed)).toEqual({
      workers: 4,
      downloadDelayMs: 250,
      retryTimes: 0,
      timeoutMs: 5000,
    });
  });

  it('reports the offending option', () => {
    const result = runArgsSchema.safeParse({ module: './spider.js', workers: '0' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe(
        'Invalid --workers. Provide a positive integer.',
      );
    }
  });

  it('requires a module', () => {
    const result = runArgsSchema.safeParse({ module: '' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('Missing required argument: <module>');
    }
  });
});

describe('toSpider', () => {
  it('accepts a spider instance or a spider class as default export', () => {
    const instance = new ExampleSpider();

    expect(toSpider({ default: instance }, 'a.js')).toBe(instance);
    expect(toSpider({ default: ExampleSpider }, 'b.js')).toBeInstanceOf(ExampleSpider);
  });

  it('rejects anything else', () => {
    expect(() => toSpider({ default: () => 'nope' }, 'c.js')).toThrow(
      'c.js must default-export a Spider instance or a Spider subclass',
    );
    expect(() => toSpider({}, 'd.js')).toThrow(TypeError);
  });
});
