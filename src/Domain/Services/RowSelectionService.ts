import { SurveyInputError } from '../Entities/SurveyInputError';

export interface RowSelection {
  rowIndex?: number;
  startRow?: number;
  limit?: number;
}

export class RowSelectionService {
  /**
   * Returns the 0-based data-row indices to process, in order.
   */
  select(rowCount: number, selection: RowSelection = {}): number[] {
    if (rowCount === 0) {
      throw new SurveyInputError('CSV has no data rows');
    }

    const range = `(0..${rowCount - 1})`;

    if (selection.rowIndex !== undefined) {
      if (selection.rowIndex < 0 || selection.rowIndex >= rowCount) {
        throw new SurveyInputError(`Row index ${selection.rowIndex} out of range ${range}`);
      }
      return [selection.rowIndex];
    }

    const start = selection.startRow ?? 0;
    if (start < 0 || start >= rowCount) {
      throw new SurveyInputError(`Start row ${start} out of range ${range}`);
    }

    if (selection.limit !== undefined && selection.limit < 1) {
      throw new SurveyInputError(`Limit must be at least 1, got ${selection.limit}`);
    }

    const end = selection.limit === undefined ? rowCount : Math.min(rowCount, start + selection.limit);
    const indices: number[] = [];
    for (let index = start; index < end; index++) {
      indices.push(index);
    }
    return indices;
  }
}
