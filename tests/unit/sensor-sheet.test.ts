/**
 * センサー定義シート読み込みのテスト
 */
import * as path from 'path';
import { loadSensorSheet, parseSensorSheet, SheetOptions } from '../../src/sensor-sheet';

const options: SheetOptions = {
  separator: ',',
  defaultProvider: 'SIGE_PR_0190',
  defaultTokenEnv: 'SENTILO_TOKEN'
};

describe('loadSensorSheet', () => {
  it('CSVからセンサー定義とルーティング情報を読み込む', async () => {
    const definitions = await loadSensorSheet(path.join(__dirname, '../fixtures/sensores.csv'), options);

    expect(definitions).toEqual([
      {
        descriptor: { id: '0190_MV_C1_ASB_ACTIVEE', description: 'Energia activa importada', unit: 'kWh' },
        route: { providerId: 'SIGE_PR_0190', tokenEnv: 'SENTILO_TOKEN', calculated: false }
      },
      {
        descriptor: { id: '0524_MV_FVENERGIA', description: 'Producció fotovoltaica', unit: 'kWh' },
        route: { providerId: 'SIGE_PR_0524', tokenEnv: 'SENTILO_TOKEN_FV', calculated: false }
      },
      {
        descriptor: { id: '0190_TEMP_SALA1', description: '0190_TEMP_SALA1', unit: '°C' },
        route: { providerId: 'SIGE_PR_0190', tokenEnv: 'SENTILO_TOKEN_CLIMA', calculated: false }
      },
      {
        descriptor: { id: '0190_MV_ENERGIA_CONS', description: 'Energia consumida', unit: 'kWh' },
        route: { providerId: 'SIGE_PR_0190', tokenEnv: 'SENTILO_TOKEN', calculated: true }
      }
    ]);
  });

  it('ファイルがない場合はエラー', async () => {
    await expect(loadSensorSheet('/nonexistent/sensores.csv', options))
      .rejects.toThrow('センサー定義シートが見つかりません: /nonexistent/sensores.csv');
  });
});

describe('parseSensorSheet', () => {
  it('sensor_id 列がない場合はエラー', async () => {
    const csv = Buffer.from('id,descripcion\nA,Sensor A\n');
    await expect(parseSensorSheet(csv, options)).rejects.toThrow('センサー定義シートに sensor_id 列がありません。列: id, descripcion');
  });

  it('任意列がなくても読み込める', async () => {
    const csv = Buffer.from('sensor_id\nA\n\nB\n');
    const definitions = await parseSensorSheet(csv, options);

    expect(definitions.map(definition => definition.descriptor)).toEqual([
      { id: 'A', description: 'A', unit: '' },
      { id: 'B', description: 'B', unit: '' }
    ]);
    expect(definitions.every(definition => !definition.route.calculated)).toBe(true);
  });

  it('区切り文字と別名の列を扱う', async () => {
    const csv = Buffer.from('sensor_id;descripcion;unidad;tipo_dato\nA;Temperatura;°C;json\nB;Document;;PDF\n');
    const definitions = await parseSensorSheet(csv, { ...options, separator: ';' });

    expect(definitions).toEqual([{
      descriptor: { id: 'A', description: 'Temperatura', unit: '°C' },
      route: { providerId: 'SIGE_PR_0190', tokenEnv: 'SENTILO_TOKEN', calculated: false }
    }]);
  });
});
