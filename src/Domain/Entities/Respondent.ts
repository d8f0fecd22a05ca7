import { FormUtils } from '../Services/FormUtils';

/**
 * One CSV data row. `index` is 0-based and excludes the header line.
 */
export class RespondentEntity {
  constructor(
    public readonly index: number,
    public readonly values: Readonly<Record<string, string>>
  ) {}

  static fromRecord(index: number, headers: string[], record: string[]): RespondentEntity {
    const values: Record<string, string> = {};
    headers.forEach((header, column) => {
      values[header] = record[column] ?? '';
    });
    return new RespondentEntity(index, values);
  }

  /**
   * Value for a header; falls back to a whitespace-insensitive header match, then "".
   */
  get(header: string): string {
    if (Object.prototype.hasOwnProperty.call(this.values, header)) {
      return this.values[header];
    }
    const wanted = FormUtils.normSpace(header);
    for (const [key, value] of Object.entries(this.values)) {
      if (FormUtils.normSpace(key) === wanted) {
        return value;
      }
    }
    return '';
  }

  headers(): string[] {
    return Object.keys(this.values);
  }

  isBlankFor(headers: string[]): boolean {
    return headers.every((header) => this.get(header).trim() === '');
  }

  label(): string {
    return `row ${this.index}`;
  }
}
