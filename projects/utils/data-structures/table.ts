import type { IHaveDebugStr } from '../debug.js';

export interface ConstTable<D> extends IHaveDebugStr {
  readonly numRows: number;
  readonly numCols: number;
  getCell(row: number, col: number): D;
}

export class Table<D> implements ConstTable<D> {
  private rows: D[][] = [];
  readonly numCols: number;

  constructor(numCols: number) {
    this.numCols = numCols;
  }

  get numRows() {
    return this.rows.length;
  }

  /**
   * Add a row to the table, filling each cell with the value
   * returned for its column.
   *
   * @returns the index of the new row
   */
  addRow(value: (col: number) => D): number {
    let cols: D[] = [];
    for (let c = 0; c < this.numCols; c++) {
      cols.push(value(c));
    }
    this.rows.push(cols);
    return this.rows.length - 1;
  }

  /**
   * @returns The value of the cell with the given row/col
   */
  getCell(row: number, col: number): D {
    return this.rows[row][col];
  }

  /**
   * return a debug string for the table, with every column
   * right-aligned to its widest cell.
   */
  toDebugStr() {
    let out = '';
    let minWidths: number[] = [];
    for (let ci = 0; ci < this.numCols; ci++) {
      let minWidth = 1;
      for (let ri = 0; ri < this.numRows; ri++) {
        minWidth = Math.max(minWidth, `${this.getCell(ri, ci)}`.length);
      }
      minWidths.push(minWidth);
    }

    for (let row = 0; row < this.numRows; row++) {
      for (let col = 0; col < this.numCols; col++) {
        out += `${this.getCell(row, col)}`.padStart(minWidths[col] + 2);
      }
      out += '\n';
    }
    return out;
  }
}
