/**
 * 派生時系列の計算エンジン
 */
import {
  DerivationOptions,
  DerivationResult,
  DerivedSeriesSpec,
  ExpressionNode
} from './types';
import { parseDerivationExpression } from './parser';
import { toAlignmentKey } from '../utils/time-utils';
import { Sample, Series } from '../types/series';

export const DEFAULT_DERIVATION_OPTIONS: DerivationOptions = {
  alignment: 'minute',
  missingOptional: 'zero'
};

/**
 * 元時系列を組み合わせて計算センサーの時系列を生成する
 *
 * 必須オペランドすべてに存在する位置合わせキーについてのみ計算し、
 * 出力タイムスタンプには最初の必須オペランドの元のタイムスタンプを使う。
 *
 * @param spec 計算センサーの定義
 * @param baseSeries センサーID -> 構築済み時系列（読み取り専用）
 * @param options 位置合わせ・欠落時の既定値
 * @returns 計算結果
 */
export function deriveSeries(
  spec: DerivedSeriesSpec,
  baseSeries: ReadonlyMap<string, Series>,
  options: DerivationOptions = DEFAULT_DERIVATION_OPTIONS
): DerivationResult {
  const alignment = spec.alignment ?? options.alignment;
  const missingOptionalPolicy = spec.missingOptional ?? options.missingOptional;
  const expression = parseDerivationExpression(spec.expression);

  const missingMandatory: string[] = [];
  const missingOptional: string[] = [];
  const mandatory: Array<{ name: string; samples: Map<string, Sample> }> = [];
  const optional: Array<{ name: string; samples: Map<string, Sample> | null }> = [];

  for (const [name, operand] of Object.entries(spec.operands)) {
    const series = baseSeries.get(operand.sensorId);

    if (operand.optional) {
      if (!series) {
        missingOptional.push(operand.sensorId);
      }
      optional.push({ name, samples: series ? indexByKey(series.samples, alignment) : null });
      continue;
    }

    if (!series) {
      missingMandatory.push(operand.sensorId);
      continue;
    }
    mandatory.push({ name, samples: indexByKey(series.samples, alignment) });
  }

  const result: DerivationResult = {
    series: {
      sensorId: spec.sensorId,
      description: spec.description,
      unit: spec.unit,
      kind: 'interval_consumption',
      samples: []
    },
    missingMandatory,
    missingOptional
  };

  if (missingMandatory.length > 0 || mandatory.length === 0) {
    return result;
  }

  const [primary, ...others] = mandatory;

  for (const [key, primarySample] of primary.samples) {
    const values: Record<string, number> = { [primary.name]: primarySample.value };

    if (!others.every(other => assignValue(values, other.name, other.samples.get(key)))) {
      continue;
    }

    let dropped = false;
    for (const operand of optional) {
      const sample = operand.samples?.get(key);
      if (sample) {
        values[operand.name] = sample.value;
      } else if (operand.samples && missingOptionalPolicy === 'drop') {
        dropped = true;
        break;
      } else {
        values[operand.name] = 0;
      }
    }
    if (dropped) {
      continue;
    }

    const value = evaluateExpression(expression, values);
    if (Number.isFinite(value)) {
      result.series.samples.push({ timestamp: primarySample.timestamp, value });
    }
  }

  return result;
}

/**
 * 計算センサーの定義を依存関係順に並べ替える
 *
 * 他の計算センサーをオペランドに持つ定義は、その計算センサーの後に並ぶ。
 * 依存関係のない定義同士は宣言順を保つ。
 *
 * @param specs 計算センサーの定義（宣言順）
 * @returns 依存関係順の定義
 * @throws 定義が循環している場合
 */
export function orderDerivedSpecs(specs: readonly DerivedSeriesSpec[]): DerivedSeriesSpec[] {
  const byId = new Map(specs.map(spec => [spec.sensorId, spec]));
  const state = new Map<string, 'visiting' | 'done'>();
  const ordered: DerivedSeriesSpec[] = [];

  const visit = (spec: DerivedSeriesSpec, chain: string[]): void => {
    const current = state.get(spec.sensorId);
    if (current === 'done') {
      return;
    }
    if (current === 'visiting') {
      throw new Error(`計算センサーの定義が循環しています: ${[...chain, spec.sensorId].join(' -> ')}`);
    }

    state.set(spec.sensorId, 'visiting');
    for (const operand of Object.values(spec.operands)) {
      const dependency = byId.get(operand.sensorId);
      if (dependency) {
        visit(dependency, [...chain, spec.sensorId]);
      }
    }
    state.set(spec.sensorId, 'done');
    ordered.push(spec);
  };

  specs.forEach(spec => visit(spec, []));
  return ordered;
}

/**
 * 時系列を位置合わせキーで索引化（同一キーは後のサンプルで上書き）
 * Mapの挿入順は最初の出現位置のままなので、キーは昇順を保つ
 */
function indexByKey(samples: readonly Sample[], alignment: DerivationOptions['alignment']): Map<string, Sample> {
  const index = new Map<string, Sample>();
  for (const sample of samples) {
    index.set(toAlignmentKey(sample.timestamp, alignment), sample);
  }
  return index;
}

function assignValue(values: Record<string, number>, name: string, sample: Sample | undefined): boolean {
  if (!sample) {
    return false;
  }
  values[name] = sample.value;
  return true;
}

/**
 * 構文木を評価
 * @param node 構文木
 * @param values オペランド名 -> 値
 * @returns 計算結果（0除算などで非有限値になる場合あり）
 */
export function evaluateExpression(node: ExpressionNode, values: Record<string, number>): number {
  switch (node.type) {
    case 'number':
      return node.value;
    case 'operand': {
      const value = values[node.name];
      if (value === undefined) {
        throw new Error(`未定義のオペランドです: ${node.name}`);
      }
      return value;
    }
    case 'negate':
      return -evaluateExpression(node.operand, values);
    case 'binary': {
      const left = evaluateExpression(node.left, values);
      const right = evaluateExpression(node.right, values);
      switch (node.operator) {
        case '+':
          return left + right;
        case '-':
          return left - right;
        case '*':
          return left * right;
        case '/':
          return left / right;
      }
    }
  }
}
