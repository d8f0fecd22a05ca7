import { IValidationError } from '../Repositories/IValidationError';

/** Represents the outcome of submitting the survey for one CSV row.
 * Built when the row starts and completed with `withResult` once the loop ends.
 */
export type SubmissionStatus = 'completed' | 'failed' | 'halted' | 'skipped';

export interface RespondentSubmissionResult {
  status: SubmissionStatus;
  message: string;
  pagesVisited: number;
  actionsPerformed: number;
  validationErrors: IValidationError[];
  finishedAt: Date;
}

export interface RespondentSubmissionSummary {
  rowIndex: number;
  status: SubmissionStatus | 'pending';
  attempts: number;
  pagesVisited: number;
  actionsPerformed: number;
  message: string;
  validationErrors: IValidationError[];
  startedAt: string;
  finishedAt?: string;
}

export class RespondentSubmissionEntity {
  constructor(
    public readonly rowIndex: number,
    public readonly attempts: number = 1,
    public readonly startedAt: Date = new Date(),
    public readonly result?: RespondentSubmissionResult
  ) {}

  static start(rowIndex: number, attempts: number = 1): RespondentSubmissionEntity {
    return new RespondentSubmissionEntity(rowIndex, attempts);
  }

  static skipped(rowIndex: number, message: string): RespondentSubmissionEntity {
    return RespondentSubmissionEntity.start(rowIndex, 0).withResult({
      status: 'skipped',
      message,
      pagesVisited: 0,
      actionsPerformed: 0,
      validationErrors: [],
      finishedAt: new Date(),
    });
  }

  withResult(result: RespondentSubmissionResult): RespondentSubmissionEntity {
    return new RespondentSubmissionEntity(this.rowIndex, this.attempts, this.startedAt, result);
  }

  get status(): SubmissionStatus | 'pending' {
    return this.result?.status ?? 'pending';
  }

  toSummary(): RespondentSubmissionSummary {
    return {
      rowIndex: this.rowIndex,
      status: this.status,
      attempts: this.attempts,
      pagesVisited: this.result?.pagesVisited ?? 0,
      actionsPerformed: this.result?.actionsPerformed ?? 0,
      message: this.result?.message ?? '',
      validationErrors: this.result?.validationErrors ?? [],
      startedAt: this.startedAt.toISOString(),
      finishedAt: this.result?.finishedAt.toISOString(),
    };
  }
}
