import { describe, it, expect } from 'vitest';
import { FormatError, ModelError, NotFoundError, ParmLensError, ValueParseError } from '../errors.js';

describe('ParmLensError', () => {
  it('詳細が無ければペイロードに details を含めない', () => {
    expect(new NotFoundError('Atom serial 9 not found').toPayload()).toEqual({
      code: 'not_found',
      message: 'Atom serial 9 not found',
    });
  });

  it('toResult は ok: false の結果に包む', () => {
    const error = new FormatError('CHARGE section missing', { section: 'CHARGE', expected: 6 });

    expect(error).toBeInstanceOf(ParmLensError);
    expect(error.toResult()).toEqual({
      ok: false,
      error: {
        code: 'parm7_parse_failed',
        message: 'CHARGE section missing',
        details: { section: 'CHARGE', expected: 6 },
      },
    });
  });

  it('ValueParseError は元のトークンを詳細に持つ', () => {
    const error = new ValueParseError(' 1.2.3 ', 'float');

    expect(error.toPayload()).toEqual({
      code: 'invalid_value',
      message: "Cannot parse float value '1.2.3'",
      details: { raw: ' 1.2.3 ' },
    });
  });

  it('ModelError は任意のコードを取る', () => {
    expect(new ModelError('ambiguous', 'Residue id is not unique', ['A:1', 'B:1']).code).toBe('ambiguous');
  });
});
