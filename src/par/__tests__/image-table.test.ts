import { ImageTable } from '../image-table';
import { SITE_PROFILES } from '../profiles';

jest.mock('../../utils/logger');

const columns = SITE_PROFILES['amslei-v4.2'].columns;

function row(slice: number, overrides: Record<number, string> = {}): string {
  const values = new Array<string>(columns.minColumns).fill('0');
  values[columns.sliceNumber] = String(slice);
  for (const [index, value] of Object.entries(overrides)) {
    values[Number(index)] = value;
  }
  return ` ${values.join(' ')}`;
}

function parTail(rows: string[]): string {
  return [
    '# === IMAGE INFORMATION DEFINITION =============================================',
    '#  slice number                             (integer)',
    '#',
    '# === IMAGE INFORMATION ==========================================================',
    '#  sl ec  dyn ph ty    idx pix scan% rec size',
    '',
    ...rows,
    '',
    '# === END OF DATA DESCRIPTION FILE ===============================================',
    ' 99 this line is outside the table',
  ].join('\n');
}

describe('ImageTable', () => {
  it('should parse rows of the image information section only', () => {
    const table = ImageTable.parse(parTail([row(1), row(2), row(3)]), columns);

    expect(table.rowCount).toBe(3);
    expect(table.maxSliceNumber()).toBe(3);
  });

  it('should skip rows with fewer columns than the profile requires', () => {
    const short = new Array<string>(columns.minColumns - 1).fill('7').join(' ');
    const table = ImageTable.parse(parTail([short, row(2)]), columns);

    expect(table.rowCount).toBe(1);
    expect(table.maxSliceNumber()).toBe(2);
  });

  it('should read values from the first row', () => {
    const table = ImageTable.parse(
      parTail([
        row(1, { [columns.echoTime]: '30.00', [columns.rescaleSlope]: '1.5' }),
        row(2, { [columns.echoTime]: '60.00' }),
      ]),
      columns
    );

    expect(table.first('echoTime')).toBe(30);
    expect(table.first('rescaleSlope')).toBe(1.5);
  });

  it('should find the first accepted integer within a row limit', () => {
    const table = ImageTable.parse(
      parTail([
        row(1, { [columns.sliceOrientation]: '0' }),
        row(2, { [columns.sliceOrientation]: '2' }),
        row(3, { [columns.sliceOrientation]: '3' }),
      ]),
      columns
    );

    expect(table.findInteger('sliceOrientation', code => code > 0)).toBe(2);
    expect(table.findInteger('sliceOrientation', code => code > 0, 1)).toBeNull();
  });

  it('should be empty without an image information section', () => {
    const table = ImageTable.parse('.    Repetition time [ms] : 2000', columns);

    expect(table.rowCount).toBe(0);
    expect(table.first('echoTime')).toBeNull();
    expect(table.maxSliceNumber()).toBeNull();
  });
});
