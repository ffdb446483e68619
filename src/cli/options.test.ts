import { afterEach, describe, expect, it, vi } from 'vitest';
import { UsageError } from '../error/usageError.js';
import { VERSION } from '../version.js';
import { parseOptions } from './options.js';

describe('parseOptions', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('applies defaults', async () => {
    const [err, outcome] = await parseOptions(['-s', 'catalog.test']);

    expect(err).toBeNull();
    expect(outcome).toEqual({
      kind: 'run',
      config: {
        server: 'catalog.test',
        resource: '',
        method: 'GET',
        verify: true,
        traceback: false,
        debug: false,
        comment: undefined,
        data: undefined,
        file: undefined,
      },
    });
  });

  it('returns a frozen configuration', async () => {
    const [, outcome] = await parseOptions(['-s', 'catalog.test']);

    expect(outcome?.kind === 'run' && Object.isFrozen(outcome.config)).toBe(true);
  });

  it('reads every long flag', async () => {
    const [err, outcome] = await parseOptions([
      '--server',
      'https://catalog.test/api',
      '--request',
      'post',
      '--resource',
      'products/42',
      '--data',
      '{"name":"Widget"}',
      '--traceback',
      '--debug',
      '--comment',
      'rename widget',
    ]);

    expect(err).toBeNull();
    expect(outcome).toEqual({
      kind: 'run',
      config: {
        server: 'https://catalog.test/api',
        resource: 'products/42',
        method: 'post',
        verify: true,
        traceback: true,
        debug: true,
        comment: 'rename widget',
        data: '{"name":"Widget"}',
        file: undefined,
      },
    });
  });

  it('reads short aliases', async () => {
    const [err, outcome] = await parseOptions([
      '-s',
      'catalog.test',
      '-x',
      'DELETE',
      '-r',
      'products/7',
      '-f',
      'payload.json',
      '-t',
      '-k',
      '-c',
      'eol',
    ]);

    expect(err).toBeNull();
    expect(outcome).toEqual({
      kind: 'run',
      config: {
        server: 'catalog.test',
        resource: 'products/7',
        method: 'DELETE',
        verify: false,
        traceback: true,
        debug: false,
        comment: 'eol',
        data: undefined,
        file: 'payload.json',
      },
    });
  });

  it('accepts - as the file for standard input', async () => {
    const [, outcome] = await parseOptions(['-s', 'catalog.test', '--file=-']);

    expect(outcome?.kind === 'run' && outcome.config.file).toBe('-');
  });

  it('uses a CA bundle path as the verification mode', async () => {
    const [, outcome] = await parseOptions(['-s', 'catalog.test', '--ca-cert', '/etc/ssl/catalog.pem']);

    expect(outcome?.kind === 'run' && outcome.config.verify).toBe('/etc/ssl/catalog.pem');
  });

  it('takes options from CATALOG_ environment variables', async () => {
    vi.stubEnv('CATALOG_SERVER', 'env.catalog.test');
    vi.stubEnv('CATALOG_RESOURCE', 'brands');

    const [err, outcome] = await parseOptions(['-r', 'products']);

    expect(err).toBeNull();
    expect(outcome?.kind === 'run' && outcome.config.server).toBe('env.catalog.test');
    expect(outcome?.kind === 'run' && outcome.config.resource).toBe('products');
  });

  it('requires a server', async () => {
    const [err, outcome] = await parseOptions(['-r', 'products']);

    expect(outcome).toBeNull();
    expect(err).toBeInstanceOf(UsageError);
    expect(err?.message).toBe('Missing required argument: server');
    expect(err?.exitCode).toBe(1);
  });

  it('rejects a blank server', async () => {
    const [err] = await parseOptions(['-s', '  ']);

    expect(err?.message).toBe('invalid options: error validating data: server: server address is required');
  });

  it('rejects --insecure together with --ca-cert', async () => {
    const [err] = await parseOptions(['-s', 'catalog.test', '-k', '--ca-cert', 'ca.pem']);

    expect(err?.message).toBe('invalid options: error validating data: --insecure and --ca-cert are mutually exclusive');
  });

  it('rejects --data together with --file', async () => {
    const [err] = await parseOptions(['-s', 'catalog.test', '-d', '{}', '-f', 'payload.json']);

    expect(err?.message).toBe('invalid options: error validating data: --data and --file are mutually exclusive');
  });

  it('resolves --version to the version text', async () => {
    const [err, outcome] = await parseOptions(['--version']);

    expect(err).toBeNull();
    expect(outcome).toEqual({ kind: 'exit', output: VERSION });
  });

  it('resolves --help to the usage text', async () => {
    const [err, outcome] = await parseOptions(['--help']);

    expect(err).toBeNull();
    expect(outcome?.kind).toBe('exit');
    expect(outcome?.kind === 'exit' && outcome.output).toContain('Catalog server address');
  });
});
