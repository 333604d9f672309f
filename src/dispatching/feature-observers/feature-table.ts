import { ValidationError } from '../../core/errors';

/**
 * Dense numeric table: one row per entity (operation, machine or job), one
 * column per feature.
 */
export class FeatureTable {
    private readonly data: Float64Array;

    constructor(
        readonly rows: number,
        readonly columns = 1,
    ) {
        this.data = new Float64Array(rows * columns);
    }

    get(row: number, column = 0): number {
        return this.data[this.index(row, column)];
    }

    set(row: number, value: number, column = 0): void {
        this.data[this.index(row, column)] = value;
    }

    add(row: number, delta: number, column = 0): void {
        this.data[this.index(row, column)] += delta;
    }

    fill(value: number): void {
        this.data.fill(value);
    }

    fillColumn(column: number, value: number): void {
        for (let row = 0; row < this.rows; row++) {
            this.data[this.index(row, column)] = value;
        }
    }

    row(row: number): number[] {
        const start = this.index(row, 0);
        return Array.from(this.data.subarray(start, start + this.columns));
    }

    column(column: number): number[] {
        return Array.from({ length: this.rows }, (_, row) => this.get(row, column));
    }

    toArray(): number[][] {
        return Array.from({ length: this.rows }, (_, row) => this.row(row));
    }

    private index(row: number, column: number): number {
        if (!Number.isInteger(row) || row < 0 || row >= this.rows) {
            throw new ValidationError(`Row ${row} is out of range for a table with ${this.rows} rows.`);
        }
        if (!Number.isInteger(column) || column < 0 || column >= this.columns) {
            throw new ValidationError(`Column ${column} is out of range for a table with ${this.columns} columns.`);
        }
        return row * this.columns + column;
    }
}
