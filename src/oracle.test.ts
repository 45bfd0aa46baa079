import path from 'node:path';
import { describe, it, expect, vi } from 'vitest';
import { createMockLogger } from '../tests/support/logger';
import { OracleInvocationError, SchemaNotFoundError, UnsupportedFieldKindError } from './errors';
import { DIFFICULT, MIDDLE } from './messages';
import { ProtocOracle, renderTextproto } from './oracle';
import type { CommandResult, CommandRunner } from './oracle';

const SCHEMA_DIR = path.resolve(__dirname, '..', 'proto');

const request = {
  schemaFile: 'simple.proto',
  messageType: 'codec.simple.Int32Value',
  text: 'value: 1\n',
  label: 'int32[1]',
};

function fakeRunner(result: Partial<CommandResult> = {}) {
  return vi.fn<CommandRunner>(() => ({
    status: 0,
    stdout: new Uint8Array([0x08, 0x01]),
    stderr: '',
    ...result,
  }));
}

function oracleWith(runner: CommandRunner, logger = createMockLogger()) {
  return new ProtocOracle({ protoc: 'protoc', schemaDir: SCHEMA_DIR, includeDirs: ['/opt/include'], logger, runner });
}

describe('ProtocOracle', () => {
  it('passes the schema, include paths and message type', () => {
    const runner = fakeRunner();
    const oracle = oracleWith(runner);
    expect(oracle.encode(request)).toEqual(new Uint8Array([0x08, 0x01]));
    expect(runner).toHaveBeenCalledWith(
      'protoc',
      [
        `--proto_path=${SCHEMA_DIR}`,
        '--proto_path=/opt/include',
        '--encode=codec.simple.Int32Value',
        path.join(SCHEMA_DIR, 'simple.proto'),
      ],
      'value: 1\n'
    );
    expect(runner).toHaveBeenCalledTimes(1);
  });

  it('logs each invocation', () => {
    const logger = createMockLogger();
    oracleWith(fakeRunner(), logger).encode(request);
    expect(logger.child).toHaveBeenCalledWith({ component: 'oracle' });
    expect(logger.debug).toHaveBeenCalledWith(
      { label: 'int32[1]', messageType: 'codec.simple.Int32Value' },
      'invoking protoc'
    );
  });

  it('fails before running when the schema file is missing', () => {
    const runner = fakeRunner();
    expect(() => oracleWith(runner).encode({ ...request, schemaFile: 'missing.proto' })).toThrow(SchemaNotFoundError);
    expect(runner).not.toHaveBeenCalled();
  });

  it('reports a non-zero exit with its stderr', () => {
    const oracle = oracleWith(fakeRunner({ status: 1, stderr: 'input:1:1: Message type has no field named "valu".' }));
    try {
      oracle.encode(request);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(OracleInvocationError);
      if (err instanceof OracleInvocationError) {
        expect(err.message).toBe('oracle.encode [int32[1]]: protoc exited with status 1');
        expect(err.details?.stderr).toBe('input:1:1: Message type has no field named "valu".');
      }
    }
  });

  it('treats any stderr output as a failure', () => {
    const oracle = oracleWith(fakeRunner({ stderr: 'warning: something\n' }));
    expect(() => oracle.encode(request)).toThrow('protoc wrote to stderr: warning: something');
  });

  it('reports a command that could not start', () => {
    const oracle = oracleWith(fakeRunner({ status: null, error: new Error('spawn protoc ENOENT') }));
    expect(() => oracle.encode(request)).toThrow('oracle.encode [int32[1]]: failed to run protoc: spawn protoc ENOENT');
  });
});

describe('renderTextproto', () => {
  it('renders set fields in schema order', () => {
    const text = renderTextproto(MIDDLE, {
      tags: ['x'],
      status: 'STATUS_OK',
      nested: { count: 5n, note: 'a' },
      values: [1, 2],
      id: 1,
      label: null,
    });
    expect(text).toBe('id: 1\nvalues: 1\nvalues: 2\nnested {\n  count: 5\n  note: "a"\n}\nstatus: STATUS_OK\ntags: "x"\n');
  });

  it('renders an empty case as empty text', () => {
    expect(renderTextproto(MIDDLE, {})).toBe('');
  });

  it('leaves implicit fields at their zero value out', () => {
    const text = renderTextproto(MIDDLE, {
      id: 0,
      label: '',
      data: new Uint8Array(0),
      status: 'STATUS_UNSPECIFIED',
      nested: { count: 0n, flag: false, note: '' },
    });
    expect(text).toBe('nested {\n}\n');
  });

  it('keeps explicit fields, oneof members and negative zero', () => {
    expect(renderTextproto(DIFFICULT, { ratio: -0, number: 0, counts: [{ key: '', value: 0 }] })).toBe(
      'ratio: -0\ncounts {\n  value: 0\n}\nnumber: 0\n'
    );
  });

  it('renders enum numbers, bytes and floats', () => {
    expect(renderTextproto(MIDDLE, { status: 2, data: new Uint8Array([0x00, 0xff]) })).toBe(
      'data: "\\x00\\xff"\nstatus: 2\n'
    );
    expect(renderTextproto(DIFFICULT, { ratio: Number.NaN, scores: [-0, 1e21] })).toBe(
      'ratio: nan\nscores: -0\nscores: 1e21\n'
    );
  });

  it('rejects a value of the wrong type', () => {
    expect(() => renderTextproto(MIDDLE, { id: 'one' })).toThrow(UnsupportedFieldKindError);
  });
});
