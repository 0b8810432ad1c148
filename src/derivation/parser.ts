/**
 * 計算式文字列のパーサー
 *
 * 文法:
 *   expression := term (('+' | '-') term)*
 *   term       := factor (('*' | '/') factor)*
 *   factor     := NUMBER | IDENTIFIER | '(' expression ')' | '-' factor
 */
import { ArithmeticOperator, ExpressionNode } from './types';

type Token =
  | { kind: 'number'; value: number; text: string }
  | { kind: 'identifier'; text: string }
  | { kind: 'operator'; text: ArithmeticOperator }
  | { kind: 'paren'; text: '(' | ')' };

const NUMBER_PATTERN = /^\d+(\.\d+)?/;
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*/;

/**
 * 計算式をパースして構文木に変換
 * @param expression 計算式 例: "imported + generated - exported"
 * @returns 構文木
 */
export function parseDerivationExpression(expression: string): ExpressionNode {
  if (!expression || expression.trim() === '') {
    throw new Error('計算式が空です');
  }

  const tokens = tokenize(expression);
  const parser = new TokenStream(tokens);
  const node = parseExpression(parser);

  const rest = parser.peek();
  if (rest) {
    throw new Error(`計算式の形式が正しくありません: 予期しないトークン "${rest.text}"`);
  }
  return node;
}

/**
 * 文字列をトークンに分割
 * @param expression 計算式
 * @returns トークンの配列
 */
function tokenize(expression: string): Token[] {
  // U+2212（全角マイナス）もマイナスとして扱う
  let rest = expression.replace(/−/g, '-');
  const tokens: Token[] = [];

  while (rest.length > 0) {
    const char = rest[0];

    if (/\s/.test(char)) {
      rest = rest.slice(1);
      continue;
    }

    if (char === '+' || char === '-' || char === '*' || char === '/') {
      tokens.push({ kind: 'operator', text: char });
      rest = rest.slice(1);
      continue;
    }

    if (char === '(' || char === ')') {
      tokens.push({ kind: 'paren', text: char });
      rest = rest.slice(1);
      continue;
    }

    const numberMatch = NUMBER_PATTERN.exec(rest);
    if (numberMatch) {
      tokens.push({ kind: 'number', value: parseFloat(numberMatch[0]), text: numberMatch[0] });
      rest = rest.slice(numberMatch[0].length);
      continue;
    }

    const identifierMatch = IDENTIFIER_PATTERN.exec(rest);
    if (identifierMatch) {
      tokens.push({ kind: 'identifier', text: identifierMatch[0] });
      rest = rest.slice(identifierMatch[0].length);
      continue;
    }

    throw new Error(`サポートされていない文字です: ${char}`);
  }

  return tokens;
}

class TokenStream {
  private position = 0;

  constructor(private readonly tokens: Token[]) {}

  peek(): Token | undefined {
    return this.tokens[this.position];
  }

  next(): Token | undefined {
    const token = this.tokens[this.position];
    this.position++;
    return token;
  }
}

function parseExpression(stream: TokenStream): ExpressionNode {
  let left = parseTerm(stream);

  for (;;) {
    const token = stream.peek();
    if (!token || token.kind !== 'operator' || (token.text !== '+' && token.text !== '-')) {
      break;
    }
    stream.next();
    const right = parseTerm(stream);
    left = { type: 'binary', operator: token.text, left, right };
  }

  return left;
}

function parseTerm(stream: TokenStream): ExpressionNode {
  let left = parseFactor(stream);

  for (;;) {
    const token = stream.peek();
    if (!token || token.kind !== 'operator' || (token.text !== '*' && token.text !== '/')) {
      break;
    }
    stream.next();
    const right = parseFactor(stream);
    left = { type: 'binary', operator: token.text, left, right };
  }

  return left;
}

function parseFactor(stream: TokenStream): ExpressionNode {
  const token = stream.next();
  if (!token) {
    throw new Error('計算式が途中で終わっています');
  }

  switch (token.kind) {
    case 'number':
      return { type: 'number', value: token.value };
    case 'identifier':
      return { type: 'operand', name: token.text };
    case 'operator':
      if (token.text === '-') {
        return { type: 'negate', operand: parseFactor(stream) };
      }
      throw new Error(`演算子の位置が正しくありません: ${token.text}`);
    case 'paren': {
      if (token.text === ')') {
        throw new Error('対応する "(" がありません');
      }
      const inner = parseExpression(stream);
      const closing = stream.next();
      if (!closing || closing.kind !== 'paren' || closing.text !== ')') {
        throw new Error('対応する ")" がありません');
      }
      return inner;
    }
  }
}

/**
 * 構文木を文字列に変換（ログ表示用）
 * @param node 構文木
 * @returns 文字列表現
 */
export function expressionToString(node: ExpressionNode): string {
  switch (node.type) {
    case 'number':
      return String(node.value);
    case 'operand':
      return node.name;
    case 'negate':
      return `-${expressionToString(node.operand)}`;
    case 'binary':
      return `(${expressionToString(node.left)} ${node.operator} ${expressionToString(node.right)})`;
  }
}

/**
 * 構文木に含まれるすべてのオペランド名を抽出
 * @param node 構文木
 * @returns オペランド名の配列（出現順・重複なし）
 */
export function extractOperandNames(node: ExpressionNode): string[] {
  const names = new Set<string>();

  function visit(current: ExpressionNode): void {
    switch (current.type) {
      case 'operand':
        names.add(current.name);
        break;
      case 'negate':
        visit(current.operand);
        break;
      case 'binary':
        visit(current.left);
        visit(current.right);
        break;
      case 'number':
        break;
    }
  }

  visit(node);
  return Array.from(names);
}
