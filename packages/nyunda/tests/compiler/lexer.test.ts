import { describe, it, expect } from 'vitest';
import { tokenize, keywordOf } from '../../src/compiler/lexer.js';
import { LexError, NyundaError } from '../../src/compiler/errors.js';

describe('Lexer', () => {
  it('should tokenize an assignment with positions', () => {
    expect(tokenize('x = 3')).toEqual([
      { kind: 'IDENTIFIER', text: 'x', pos: 0, line: 1, column: 1 },
      { kind: 'OPERATOR', text: '=', pos: 2, line: 1, column: 3 },
      { kind: 'NUMBER', text: '3', pos: 4, line: 1, column: 5 },
      { kind: 'EOF', text: '', pos: 5, line: 1, column: 6 },
    ]);
  });

  it('should tokenize integers and decimals', () => {
    const tokens = tokenize('42 3.14');
    expect(tokens[0]).toMatchObject({ kind: 'NUMBER', text: '42' });
    expect(tokens[1]).toMatchObject({ kind: 'NUMBER', text: '3.14' });
  });

  it('should tokenize keywords', () => {
    const tokens = tokenize('upami lamun sanes bari cetak jeung atawa henteu leres palsu');
    expect(tokens.slice(0, -1).every((t) => t.kind === 'KEYWORD')).toBe(true);
    expect(tokens.slice(0, -1).map(keywordOf)).toEqual([
      'if', 'elif', 'else', 'while', 'print', 'and', 'or', 'not', 'true', 'false',
    ]);
  });

  it('should treat words that only start with a keyword as identifiers', () => {
    const tokens = tokenize('cetakan bari_2 _x constructor');
    expect(tokens.slice(0, -1).map((t) => t.kind)).toEqual([
      'IDENTIFIER', 'IDENTIFIER', 'IDENTIFIER', 'IDENTIFIER',
    ]);
  });

  it('should prefer multi-character operators over their prefixes', () => {
    const tokens = tokenize('** == != <= >= = * < > + - / %');
    expect(tokens.slice(0, -1).map((t) => t.text)).toEqual([
      '**', '==', '!=', '<=', '>=', '=', '*', '<', '>', '+', '-', '/', '%',
    ]);
    expect(tokens.slice(0, -1).every((t) => t.kind === 'OPERATOR')).toBe(true);
  });

  it('should split operators that are not separated by whitespace', () => {
    const tokens = tokenize('2**3');
    expect(tokens.map((t) => [t.kind, t.text])).toEqual([
      ['NUMBER', '2'],
      ['OPERATOR', '**'],
      ['NUMBER', '3'],
      ['EOF', ''],
    ]);
  });

  it('should tokenize symbols', () => {
    const tokens = tokenize('( ) { } ;');
    expect(tokens.slice(0, -1).map((t) => [t.kind, t.text])).toEqual([
      ['SYMBOL', '('],
      ['SYMBOL', ')'],
      ['SYMBOL', '{'],
      ['SYMBOL', '}'],
      ['SYMBOL', ';'],
    ]);
  });

  it('should skip comments and track lines', () => {
    const tokens = tokenize('x = 1 # set x\ny = 2');
    expect(tokens.map((t) => t.text)).toEqual(['x', '=', '1', 'y', '=', '2', '']);
    expect(tokens[3]).toMatchObject({ text: 'y', pos: 14, line: 2, column: 1 });
  });

  it('should always end with a single EOF token', () => {
    expect(tokenize('')).toEqual([{ kind: 'EOF', text: '', pos: 0, line: 1, column: 1 }]);
    expect(tokenize('   # only a comment')).toHaveLength(1);
  });

  it('should reconstruct the source up to whitespace and comments', () => {
    const tokens = tokenize('x = 3 ** 2 # square\ncetak(x)');
    const text = tokens
      .filter((t) => t.kind !== 'EOF')
      .map((t) => t.text)
      .join(' ');
    expect(text).toBe('x = 3 ** 2 cetak ( x )');
  });

  it('should throw LexError on unrecognized characters', () => {
    expect(() => tokenize('x = 3 @ 4')).toThrow(LexError);

    try {
      tokenize('a\n  $');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(NyundaError);
      if (!(err instanceof LexError)) throw err;
      expect(err.kind).toBe('LexError');
      expect(err.character).toBe('$');
      expect(err.pos).toBe(4);
      expect(err.line).toBe(2);
      expect(err.column).toBe(3);
    }
  });

  it('should reject a lone exclamation mark', () => {
    expect(() => tokenize('x != 1')).not.toThrow();
    expect(() => tokenize('!x')).toThrow(/Unexpected character '!'/);
  });
});
