import { describe, it, expect } from 'vitest';
import { parseCSV } from '../cli/lib/csv.js';
import { buildNestedDivisions, flattenDivisions, parseCurrentRows } from './divisions.js';
import { PhoneCodeTable } from './phones.js';
import { conversionIssues } from './__fixtures__/issues.js';

const HEADER = 'province_name,province_code,ward_name,ward_code';

const CSV = [
  HEADER,
  'Tỉnh Lào Cai,15,Xã Bảo Hà,02650',
  'Thành phố Hà Nội,01,Phường Hoàn Kiếm,00070',
  'Thành phố Hà Nội,01,Phường Ba Đình,00004',
  'Tỉnh Lào Cai,15,Phường Lào Cai,02641',
].join('\n');

const PHONES = new PhoneCodeTable([
  { provinceName: 'Hà Nội', code: 24 },
  { provinceName: 'Lào Cai', code: 214 },
]);

function rowsOf(lines: readonly string[]) {
  return parseCurrentRows(parseCSV([HEADER, ...lines].join('\n'))).rows;
}

describe('parseCurrentRows()', () => {
  it('should skip short and malformed rows', () => {
    const result = parseCurrentRows(
      parseCSV([HEADER, 'Tỉnh Lào Cai,15,Xã Bảo Hà', 'Tỉnh Lào Cai,abc,Xã Bảo Hà,2650'].join('\n'))
    );

    expect(result.rows).toEqual([]);
    expect(result.skipped).toEqual([
      'line 2: expected 4 columns, found 3',
      'line 3: provinceCode: code is not numeric',
    ]);
  });
});

describe('buildNestedDivisions()', () => {
  it('should nest wards under provinces sorted by code', () => {
    const { data, warnings } = buildNestedDivisions(parseCurrentRows(parseCSV(CSV)).rows, PHONES);

    expect(warnings).toEqual([]);
    expect(data).toEqual([
      {
        name: 'Thành phố Hà Nội',
        code: 1,
        codename: 'ha_noi',
        division_type: 'thành phố trung ương',
        phone_code: 24,
        wards: [
          {
            name: 'Phường Ba Đình',
            code: 4,
            codename: 'phuong_ba_dinh',
            division_type: 'phường',
            short_codename: 'ba_dinh',
            province_code: 1,
          },
          {
            name: 'Phường Hoàn Kiếm',
            code: 70,
            codename: 'phuong_hoan_kiem',
            division_type: 'phường',
            short_codename: 'hoan_kiem',
            province_code: 1,
          },
        ],
      },
      {
        name: 'Tỉnh Lào Cai',
        code: 15,
        codename: 'lao_cai',
        division_type: 'tỉnh',
        phone_code: 214,
        wards: [
          {
            name: 'Phường Lào Cai',
            code: 2641,
            codename: 'phuong_lao_cai',
            division_type: 'phường',
            short_codename: 'lao_cai',
            province_code: 15,
          },
          {
            name: 'Xã Bảo Hà',
            code: 2650,
            codename: 'xa_bao_ha',
            division_type: 'xã',
            short_codename: 'bao_ha',
            province_code: 15,
          },
        ],
      },
    ]);
  });

  it('should use phone code 0 without a phone table', () => {
    const { data } = buildNestedDivisions(parseCurrentRows(parseCSV(CSV)).rows, null);

    expect(data.map((province) => province.phone_code)).toEqual([0, 0]);
  });

  it('should report provinces missing from the phone table', () => {
    const phones = new PhoneCodeTable([{ provinceName: 'Hà Nội', code: 24 }]);

    expect(conversionIssues(() => buildNestedDivisions(parseCurrentRows(parseCSV(CSV)).rows, phones))).toEqual([
      'province 15 "Tỉnh Lào Cai" has no phone code',
    ]);
  });

  it('should report duplicate wards and renamed provinces', () => {
    const rows = rowsOf([
      'Thành phố Hà Nội,01,Phường Ba Đình,4',
      'Thành phố Hà Nội,01,Phường Ba Đình,4',
      'Tỉnh Hà Nội,01,Phường Hoàn Kiếm,70',
    ]);

    expect(conversionIssues(() => buildNestedDivisions(rows, null))).toEqual([
      'line 3: ward 4 already listed on line 2',
      'line 4: province 1 is named "Tỉnh Hà Nội" but "Thành phố Hà Nội" on line 2',
    ]);
  });

  it('should report provinces without a rank prefix', () => {
    const rows = rowsOf(['Lào Cai,15,Xã Bảo Hà,2650']);

    expect(conversionIssues(() => buildNestedDivisions(rows, null))).toEqual([
      'line 2: province "Lào Cai" has no rank prefix',
    ]);
  });

  it('should default wards without a rank prefix to xã', () => {
    const { data, warnings } = buildNestedDivisions(rowsOf(['Tỉnh Lào Cai,15,Bảo Hà,2650']), null);

    expect(warnings).toEqual(['line 2: ward "Bảo Hà" has no rank prefix, using xã']);
    expect(data[0]?.wards[0]).toMatchObject({ division_type: 'xã', codename: 'bao_ha', short_codename: 'bao_ha' });
  });
});

describe('flattenDivisions()', () => {
  it('should list every ward with its province name', () => {
    const { data } = buildNestedDivisions(parseCurrentRows(parseCSV(CSV)).rows, PHONES);
    const flat = flattenDivisions(data);

    expect(flat.map((ward) => ward.code)).toEqual([4, 70, 2641, 2650]);
    expect(flat[2]).toEqual({
      name: 'Phường Lào Cai',
      code: 2641,
      codename: 'phuong_lao_cai',
      division_type: 'phường',
      short_codename: 'lao_cai',
      province_code: 15,
      province_name: 'Tỉnh Lào Cai',
    });
  });
});
