/**
 * 観測値種別の分類モジュール
 */
import { ObservationKind, SeriesKind } from './types/series';

/**
 * 分類ルール
 */
export interface ClassificationRules {
  energyPrefixes: string[];
  producerIds: string[];
  descriptionTokens: string[];
}

export const DEFAULT_CLASSIFICATION_RULES: ClassificationRules = {
  energyPrefixes: ['0190_MV_'],
  producerIds: ['0524_MV_FVENERGIA'],
  descriptionTokens: ['energia', 'energy']
};

export type Classifier = (sensorId: string, description?: string | null) => ObservationKind;

/**
 * 説明文を比較用に正規化（小文字化・ダイアクリティカルマーク除去）
 * @param text 説明文
 * @returns 正規化済み文字列
 */
export function normalizeDescription(text?: string | null): string {
  if (!text) {
    return '';
  }
  return text.toLowerCase().normalize('NFD').replace(/\p{Mn}/gu, '');
}

/**
 * センサーIDと説明文から観測値の種別を判定する
 *
 * 判定順（最初に一致したものを採用）:
 * 1. IDがカウンタ系プレフィックスで始まる
 * 2. IDが発電カウンタIDと一致する
 * 3. 説明文に "energia" / "energy" を含む
 * 4. それ以外は瞬時値
 *
 * @param sensorId センサーID
 * @param description 説明文（省略可）
 * @param rules 分類ルール
 * @returns 観測値の種別
 */
export function classify(
  sensorId: string,
  description?: string | null,
  rules: ClassificationRules = DEFAULT_CLASSIFICATION_RULES
): ObservationKind {
  const sid = sensorId.trim().toUpperCase();

  if (rules.energyPrefixes.some(prefix => prefix && sid.startsWith(prefix.toUpperCase()))) {
    return 'energy';
  }

  if (rules.producerIds.some(id => id.trim().toUpperCase() === sid)) {
    return 'energy';
  }

  const desc = normalizeDescription(description);
  if (desc && rules.descriptionTokens.some(token => token && desc.includes(normalizeDescription(token)))) {
    return 'energy';
  }

  return 'instantaneous';
}

/**
 * ルールを束縛した分類関数を生成
 */
export function createClassifier(rules: ClassificationRules = DEFAULT_CLASSIFICATION_RULES): Classifier {
  return (sensorId, description) => classify(sensorId, description, rules);
}

/**
 * 観測値種別を時系列種別に変換
 */
export function toSeriesKind(kind: ObservationKind): SeriesKind {
  return kind === 'energy' ? 'interval_consumption' : 'instantaneous';
}
