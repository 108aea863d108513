import { describe, it, expect } from 'vitest';
import { decodeParm7, splitLines, tokenizeParm7 } from '../tokenizer.js';

const TEXT = [
  '%VERSION  VERSION_STAMP = V0001.000',
  '%FLAG POINTERS',
  '%FORMAT(10I8)',
  '       6       4',
  '%FLAG ATOM_NAME',
  '%FORMAT(20a4)',
  'C1  C2  ',
  '%FLAG TITLE',
  '%FORMAT(20a4)',
  'MINI',
].join('\n') + '\n';

describe('splitLines', () => {
  it('末尾の改行は空行にならない', () => {
    expect(splitLines('a\nb\n')).toEqual(['a', 'b']);
  });

  it('CRLFとCRも改行として扱う', () => {
    expect(splitLines('a\r\nb\rc')).toEqual(['a', 'b', 'c']);
  });

  it('空文字列は空配列', () => {
    expect(splitLines('')).toEqual([]);
  });
});

describe('decodeParm7', () => {
  it('UTF-8としてデコードする', () => {
    expect(decodeParm7(new TextEncoder().encode('%FLAG TITLE'))).toBe('%FLAG TITLE');
  });
});

describe('tokenizeParm7', () => {
  it('%FORMATの幅でフィールドを切り出す', () => {
    const sections = tokenizeParm7(TEXT, ['POINTERS', 'ATOM_NAME']);

    expect(sections.get('POINTERS')).toEqual({
      name: 'POINTERS',
      count: 10,
      width: 8,
      line: 1,
      endLine: 3,
      tokens: [
        { value: '       6', line: 3, start: 0, end: 8 },
        { value: '       4', line: 3, start: 8, end: 16 },
      ],
    });
    expect(sections.get('ATOM_NAME')?.tokens.map((token) => token.value)).toEqual(['C1  ', 'C2  ']);
  });

  it('対象外のセクションは行範囲のみ記録する', () => {
    const sections = tokenizeParm7(TEXT, ['POINTERS']);
    const title = sections.get('TITLE');

    expect(title?.line).toBe(7);
    expect(title?.endLine).toBe(9);
    expect(title?.tokens).toEqual([]);
    expect(sections.get('ATOM_NAME')?.tokens).toEqual([]);
  });

  it('空欄のフィールドは読み飛ばし、行末で切れたフィールドは行末までにする', () => {
    const text = ['%FLAG CHARGE', '%FORMAT(3I8)', '               2      3'].join('\n');
    const tokens = tokenizeParm7(text, ['CHARGE']).get('CHARGE')?.tokens;

    expect(tokens).toEqual([
      { value: '       2', line: 2, start: 8, end: 16 },
      { value: '      3', line: 2, start: 16, end: 23 },
    ]);
  });

  it('%FORMATが無いセクションはトークンを持たない', () => {
    const text = ['%FLAG MASS', '  1.0', '%FLAG CHARGE', '%FORMAT(5E16.8)', '  1.00000000E+00'].join('\n');
    const sections = tokenizeParm7(text, ['MASS', 'CHARGE']);

    expect(sections.get('MASS')?.tokens).toEqual([]);
    expect(sections.get('MASS')?.endLine).toBe(1);
    expect(sections.get('CHARGE')?.tokens).toHaveLength(1);
  });
});
