import { RespondentSubmissionEntity, SubmissionStatus } from '../../Domain/Entities/RespondentSubmission';

/*
    * Represents the configuration for one autofill run over a CSV file.
    */

export interface SurveyRunConfig {
  csvPath: string;
  mappingPath: string;
  startUrl?: string;
  rowIndex?: number;
  startRow?: number;
  limit?: number;
  humanDelayMs?: number;
  headless?: boolean;
  manualContinue?: boolean;
  allowMissingColumns?: boolean;
  reportPath?: string;
}

export type SurveyRunTotals = Record<SubmissionStatus, number>;

export interface SurveyRunResult {
  submissions: RespondentSubmissionEntity[];
  totals: SurveyRunTotals;
  success: boolean;
  error?: string;
}

export interface ISurveyAutomation {
  run(config: SurveyRunConfig): Promise<SurveyRunResult>;
}
