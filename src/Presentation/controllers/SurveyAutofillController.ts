import { promises as fs } from 'fs';
import { ISurveyPageRepository } from '../../Domain/Repositories/ISurveyPageRepository';
import { RespondentEntity } from '../../Domain/Entities/Respondent';
import { RespondentSubmissionEntity } from '../../Domain/Entities/RespondentSubmission';
import { SurveyMappingEntity } from '../../Domain/Entities/SurveyMapping';
import { RowSelectionService } from '../../Domain/Services/RowSelectionService';
import { LoadSurveyInputUseCase } from '../../Application/Use-Cases/LoadSurveyInput';
import { FillRespondentUseCase } from '../../Application/Use-Cases/FillRespondent';
import { IUserInterface } from '../../Application/Interfaces/IUserInterface';
import {
  ISurveyAutomation,
  SurveyRunConfig,
  SurveyRunResult,
  SurveyRunTotals,
} from '../../Application/Interfaces/ISurveyAutomation';
import { Configuration } from '../../Infrastucture/config/Configurations';
import { Logger } from '../../Infrastucture/logging/Logger';

/**
 * Controller for one autofill run.
 * It loads the input, launches the browser once, and submits the survey for every selected row,
 * retrying a failed row up to MAX_ROW_ATTEMPTS times before moving on.
 */

export function emptyTotals(): SurveyRunTotals {
  return { completed: 0, failed: 0, halted: 0, skipped: 0 };
}

export class SurveyAutofillController implements ISurveyAutomation {
  constructor(
    private readonly surveyPageRepository: ISurveyPageRepository,
    private readonly loadSurveyInput: LoadSurveyInputUseCase,
    private readonly fillRespondent: FillRespondentUseCase,
    private readonly rowSelectionService: RowSelectionService,
    private readonly userInterface: IUserInterface,
    private readonly config: Configuration,
    private readonly logger: Logger
  ) {}

  async run(runConfig: SurveyRunConfig): Promise<SurveyRunResult> {
    const submissions: RespondentSubmissionEntity[] = [];
    const totals = emptyTotals();

    try {
      const loaded = await this.loadSurveyInput.execute({
        csvPath: runConfig.csvPath,
        mappingPath: runConfig.mappingPath,
        allowMissingColumns: runConfig.allowMissingColumns,
      });
      if (!loaded.success || !loaded.input) {
        return { submissions, totals, success: false, error: loaded.error ?? 'Survey input could not be loaded' };
      }
      const { respondents, mapping } = loaded.input;

      const startUrl = runConfig.startUrl ?? mapping.startUrl ?? this.config.surveyUrl;
      if (!startUrl) {
        return {
          submissions,
          totals,
          success: false,
          error: 'No start URL: pass --start-url, set startUrl in the mapping, or set SURVEY_URL',
        };
      }

      const indices = this.rowSelectionService.select(respondents.length, {
        rowIndex: runConfig.rowIndex,
        startRow: runConfig.startRow,
        limit: runConfig.limit,
      });

      await this.userInterface.showMessage(`🚀 Submitting ${indices.length} respondent(s) to ${startUrl}`);
      await this.surveyPageRepository.initialize(runConfig.headless ?? this.config.headlessMode);

      for (const index of indices) {
        const submission = await this.processRow(respondents[index], mapping, startUrl, runConfig);
        submissions.push(submission);
        if (submission.status !== 'pending') {
          totals[submission.status]++;
        }
        const icon = submission.status === 'completed' ? '✅' : submission.status === 'skipped' ? '⏭️ ' : '❌';
        await this.userInterface.showMessage(
          `${icon} row ${index}: ${submission.status} (${submission.result?.message ?? ''})`
        );
      }

      if (runConfig.reportPath) {
        await this.writeReport(runConfig.reportPath, runConfig, startUrl, submissions, totals);
      }

      return { submissions, totals, success: totals.failed === 0 && totals.halted === 0 };
    } catch (error) {
      this.logger.error('Survey run failed:', error);
      return {
        submissions,
        totals,
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error occurred',
      };
    } finally {
      await this.cleanup();
    }
  }

  private async processRow(
    respondent: RespondentEntity,
    mapping: SurveyMappingEntity,
    startUrl: string,
    runConfig: SurveyRunConfig
  ): Promise<RespondentSubmissionEntity> {
    if (respondent.isBlankFor(mapping.referencedHeaders())) {
      this.logger.info(`${respondent.label()} skipped: every mapped column is empty`);
      return RespondentSubmissionEntity.skipped(respondent.index, 'Every mapped column is empty');
    }

    const maxAttempts = this.config.maxRowAttempts;
    let submission = await this.attempt(respondent, mapping, startUrl, runConfig, 1);

    for (let attempt = 2; attempt <= maxAttempts && submission.status === 'failed'; attempt++) {
      this.logger.warn(
        `${respondent.label()} attempt ${attempt - 1} failed (${submission.result?.message ?? 'no result'}); retrying`
      );
      submission = await this.attempt(respondent, mapping, startUrl, runConfig, attempt);
    }

    if (submission.status === 'failed') {
      this.logger.error(`${respondent.label()} failed after ${submission.attempts} attempt(s); moving on`);
    }
    return submission;
  }

  private async attempt(
    respondent: RespondentEntity,
    mapping: SurveyMappingEntity,
    startUrl: string,
    runConfig: SurveyRunConfig,
    attempt: number
  ): Promise<RespondentSubmissionEntity> {
    this.logger.info(`${respondent.label()} attempt ${attempt}`);
    const response = await this.fillRespondent.execute({
      respondent,
      mapping,
      startUrl,
      attempt,
      options: {
        maxSteps: this.config.maxSteps,
        humanDelayMs: runConfig.humanDelayMs ?? this.config.humanDelayMs,
        pageTimeout: this.config.pageTimeout,
        completionText: this.config.completionText,
        manualContinue: runConfig.manualContinue ?? false,
      },
    });
    return response.submission;
  }

  private async writeReport(
    reportPath: string,
    runConfig: SurveyRunConfig,
    startUrl: string,
    submissions: RespondentSubmissionEntity[],
    totals: SurveyRunTotals
  ): Promise<void> {
    const report = {
      generatedAt: new Date().toISOString(),
      csv: runConfig.csvPath,
      mapping: runConfig.mappingPath,
      startUrl,
      totals,
      submissions: submissions.map((submission) => submission.toSummary()),
    };
    await fs.writeFile(reportPath, `${JSON.stringify(report, null, 2)}\n`, 'utf8');
    this.logger.info(`Report written to ${reportPath}`);
  }

  private async cleanup(): Promise<void> {
    try {
      await this.surveyPageRepository.close();
    } catch (error) {
      this.logger.warn('Browser did not close cleanly:', error);
    }
  }
}
