/**
 * 計算式パーサーのテスト
 */
import { expressionToString, extractOperandNames, parseDerivationExpression } from '../../../src/derivation/parser';

describe('parseDerivationExpression', () => {
  it('加減算を左結合で解析する', () => {
    const node = parseDerivationExpression('imported + generated - exported');
    expect(expressionToString(node)).toBe('((imported + generated) - exported)');
  });

  it('乗除算を優先する', () => {
    expect(expressionToString(parseDerivationExpression('a + b * 2'))).toBe('(a + (b * 2))');
    expect(expressionToString(parseDerivationExpression('(a + b) / 4'))).toBe('((a + b) / 4)');
  });

  it('単項マイナスとU+2212を扱う', () => {
    expect(expressionToString(parseDerivationExpression('-a'))).toBe('-a');
    expect(expressionToString(parseDerivationExpression('a − b'))).toBe('(a - b)');
  });

  it('数値リテラルを解析する', () => {
    expect(parseDerivationExpression('0.5')).toEqual({ type: 'number', value: 0.5 });
  });

  it('空の計算式はエラー', () => {
    expect(() => parseDerivationExpression('  ')).toThrow('計算式が空です');
  });

  it('不正な計算式はエラー', () => {
    expect(() => parseDerivationExpression('a +')).toThrow('計算式が途中で終わっています');
    expect(() => parseDerivationExpression('(a + b')).toThrow('対応する ")" がありません');
    expect(() => parseDerivationExpression('a b')).toThrow('予期しないトークン "b"');
    expect(() => parseDerivationExpression('a % b')).toThrow('サポートされていない文字です: %');
    expect(() => parseDerivationExpression('* a')).toThrow('演算子の位置が正しくありません: *');
  });
});

describe('extractOperandNames', () => {
  it('出現順・重複なしでオペランド名を返す', () => {
    const node = parseDerivationExpression('b - a * (b + 2) - -c');
    expect(extractOperandNames(node)).toEqual(['b', 'a', 'c']);
  });
});
