/**
 * テスト用のサンプルデータ
 * Sentiloの観測値（value はJSON文字列、timestamp は dd/MM/yyyyTHH:mm:ss）を模したもの
 */
import { HarvesterConfig } from '../../src/types/config';
import { RawObservation, SensorDefinition } from '../../src/types/series';
import { parseConfig } from '../../src/config';

/**
 * カウンタ型センサーのペイロード
 */
export function energyPayload(firstvalue: number | string, lastvalue: number | string): string {
  return JSON.stringify({ summary: { firstvalue, lastvalue, avg: 0 } });
}

/**
 * 瞬時値センサーのペイロード
 */
export function instantPayload(avg: number | string): string {
  return JSON.stringify({ summary: { avg } });
}

export function sensor(id: string, description: string, unit = 'kWh', providerId = 'SIGE_PR_0190'): SensorDefinition {
  return {
    descriptor: { id, description, unit },
    route: { providerId, tokenEnv: 'SENTILO_TOKEN', calculated: false }
  };
}

/**
 * 主要カウンタ（10:00に85、10:15に90）
 */
export const importedObservations: RawObservation[] = [
  { timestamp: '01/03/2025T10:15:02', rawPayload: energyPayload(1200, 1290) },
  { timestamp: '01/03/2025T10:00:05', rawPayload: energyPayload(1000, 1085) }
];

/**
 * 太陽光発電カウンタ（10:00に20のみ）
 */
export const generatedObservations: RawObservation[] = [
  { timestamp: '01/03/2025T10:00:40', rawPayload: energyPayload('50.5', '70.5') }
];

/**
 * 室温（瞬時値）
 */
export const temperatureObservations: RawObservation[] = [
  { timestamp: '01/03/2025T10:05:00', rawPayload: instantPayload(21.5) },
  { timestamp: '01/03/2025T10:00:00', rawPayload: instantPayload(21.25) },
  { timestamp: '', rawPayload: instantPayload(99) },
  { timestamp: '01/03/2025T10:10:00', rawPayload: 'not json' }
];

export const importedSensor = sensor('0190_MV_C1_ASB_ACTIVEE', 'Energia activa importada');
export const generatedSensor = sensor('0524_MV_FVENERGIA', 'Producció fotovoltaica', 'kWh', 'SIGE_PR_0524');
export const exportedSensor = sensor('0190_MV_CIA_EXPORT', 'Energia exportada');
export const temperatureSensor = sensor('0190_TEMP_SALA1', 'Temperatura sala 1', '°C');

/**
 * 計算センサー 0190_MV_ENERGIA_CONS = imported + generated - exported を含む設定
 */
export function createTestConfig(overrides: Record<string, unknown> = {}): HarvesterConfig {
  return parseConfig({
    derived: [
      {
        sensor_id: '0190_MV_ENERGIA_CONS',
        description: 'Energia consumida',
        unit: 'kWh',
        expression: 'imported + generated - exported',
        operands: {
          imported: '0190_MV_C1_ASB_ACTIVEE',
          generated: { sensor_id: '0524_MV_FVENERGIA', optional: true },
          exported: { sensor_id: '0190_MV_CIA_EXPORT', optional: true }
        }
      }
    ],
    ...overrides
  }, {});
}
