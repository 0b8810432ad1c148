/**
 * 計算センサー（派生時系列）用の型定義
 */
import { Series } from '../types/series';

/**
 * 算術演算子の種類
 */
export type ArithmeticOperator = '+' | '-' | '*' | '/';

/**
 * 位置合わせの粒度
 * - minute: 秒以下を切り捨てた分単位のキーで突き合わせる
 * - exact: タイムスタンプ文字列の完全一致で突き合わせる
 */
export type AlignmentGranularity = 'minute' | 'exact';

/**
 * 任意オペランドが特定キーに値を持たない場合の扱い
 * - zero: 0として計算する
 * - drop: その時刻の点を出力しない
 */
export type MissingOptionalPolicy = 'zero' | 'drop';

/**
 * 数値リテラル
 */
export interface NumberNode {
  type: 'number';
  value: number;
}

/**
 * オペランド参照（計算式中の別名）
 */
export interface OperandNode {
  type: 'operand';
  name: string;
}

/**
 * 単項マイナス
 */
export interface NegateNode {
  type: 'negate';
  operand: ExpressionNode;
}

/**
 * 二項演算
 */
export interface BinaryNode {
  type: 'binary';
  operator: ArithmeticOperator;
  left: ExpressionNode;
  right: ExpressionNode;
}

export type ExpressionNode = NumberNode | OperandNode | NegateNode | BinaryNode;

/**
 * 計算式のオペランド定義
 */
export interface OperandSpec {
  /** 参照する元センサーのID */
  sensorId: string;
  /** trueの場合、欠落していても計算を継続する */
  optional: boolean;
}

/**
 * 計算センサーの定義
 */
export interface DerivedSeriesSpec {
  sensorId: string;
  description: string;
  unit: string;
  /** 計算式 例: "imported + generated - exported" */
  expression: string;
  /** 別名 -> オペランド定義（宣言順を保持） */
  operands: Record<string, OperandSpec>;
  /** 個別に上書きする位置合わせ粒度 */
  alignment?: AlignmentGranularity;
  /** 個別に上書きする欠落時ポリシー */
  missingOptional?: MissingOptionalPolicy;
}

/**
 * 派生計算のオプション（設定ファイルの derivation セクション）
 */
export interface DerivationOptions {
  alignment: AlignmentGranularity;
  missingOptional: MissingOptionalPolicy;
}

/**
 * 派生計算の結果
 */
export interface DerivationResult {
  /** 計算結果（必須オペランド欠落時は0点） */
  series: Series;
  /** 見つからなかった必須オペランドのセンサーID */
  missingMandatory: string[];
  /** 見つからなかった任意オペランドのセンサーID（0として扱った） */
  missingOptional: string[];
}
