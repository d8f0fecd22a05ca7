import { IUserInterface } from '../Interfaces/IUserInterface';
import { RespondentEntity } from '../../Domain/Entities/Respondent';
import { RespondentSubmissionEntity, SubmissionStatus } from '../../Domain/Entities/RespondentSubmission';
import { SurveyMappingEntity } from '../../Domain/Entities/SurveyMapping';
import { ValidationError } from '../../Domain/Entities/ValidationError';
import { IValidationError } from '../../Domain/Repositories/IValidationError';
import { ISurveyPageRepository } from '../../Domain/Repositories/ISurveyPageRepository';
import { PageFillService } from '../../Domain/Services/PageFillService';
import { Logger } from '../../Infrastucture/logging/Logger';

/**
 * Use case for submitting the survey once for one respondent.
 * Opens the start URL, then fills and advances page by page until the survey ends,
 * the page stops advancing, or the step limit is reached.
 */

export const STUCK_PAGE_LIMIT = 3;

export interface FillRespondentOptions {
  maxSteps: number;
  humanDelayMs: number;
  pageTimeout: number;
  completionText: string;
  manualContinue: boolean;
}

export interface FillRespondentRequest {
  respondent: RespondentEntity;
  mapping: SurveyMappingEntity;
  startUrl: string;
  attempt: number;
  options: FillRespondentOptions;
}

export interface FillRespondentResponse {
  submission: RespondentSubmissionEntity;
  success: boolean;
  error?: string;
}

interface Progress {
  pagesVisited: number;
  actionsPerformed: number;
}

export class FillRespondentUseCase {
  constructor(
    private readonly surveyPageRepository: ISurveyPageRepository,
    private readonly pageFillService: PageFillService,
    private readonly userInterface: IUserInterface,
    private readonly logger: Logger
  ) {}

  async execute(request: FillRespondentRequest): Promise<FillRespondentResponse> {
    const submission = RespondentSubmissionEntity.start(request.respondent.index, request.attempt);
    const progress: Progress = { pagesVisited: 0, actionsPerformed: 0 };

    try {
      await this.openSurvey(request);
      const outcome = await this.walkPages(request, progress);
      const finished = this.finish(submission, progress, outcome.status, outcome.message, outcome.validationErrors);

      return {
        submission: finished,
        success: outcome.status === 'completed',
        error: outcome.status === 'completed' ? undefined : outcome.message,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error occurred';
      this.logger.error(`${request.respondent.label()} attempt ${request.attempt} failed:`, error);
      return {
        submission: this.finish(submission, progress, 'failed', message, []),
        success: false,
        error: message,
      };
    }
  }

  private async openSurvey(request: FillRespondentRequest): Promise<void> {
    const repo = this.surveyPageRepository;
    await repo.navigateToPage(request.startUrl, request.options.pageTimeout);

    const readySelector = request.mapping.readySelector;
    if (readySelector && !(await repo.waitForSelector(readySelector, request.options.pageTimeout))) {
      this.logger.warn(`Ready selector ${readySelector} did not appear; continuing`);
    }
  }

  private async walkPages(
    request: FillRespondentRequest,
    progress: Progress
  ): Promise<{ status: SubmissionStatus; message: string; validationErrors: IValidationError[] }> {
    const repo = this.surveyPageRepository;
    const { respondent, mapping, options } = request;
    let unchanged = 0;

    for (let step = 1; step <= options.maxSteps; step++) {
      const before = await repo.pageSignature();
      const filled = await this.pageFillService.fillCurrentPage(mapping, respondent, {
        humanDelayMs: options.humanDelayMs,
      });
      progress.pagesVisited++;
      progress.actionsPerformed += filled;
      this.logger.info(`${respondent.label()} step ${step}: ${filled} actions`);

      if (filled === 0) {
        if (!(await repo.isNextAvailable())) {
          return { status: 'halted', message: 'Next not available on an unmapped page', validationErrors: [] };
        }
        await repo.clickNextAndWait();
      } else if (options.manualContinue) {
        await this.userInterface.askQuestion('⏸️  Review the page, click Next in the browser, then press Enter:');
      } else {
        if (!(await repo.isNextAvailable())) {
          return { status: 'halted', message: 'Next disabled', validationErrors: [] };
        }
        await repo.clickNextAndWait();
      }

      if ((await repo.containsText(options.completionText)) || (await repo.questionIds()).length === 0) {
        return { status: 'completed', message: 'Survey completed', validationErrors: [] };
      }

      const after = await repo.pageSignature();
      unchanged = after === before ? unchanged + 1 : 0;

      if (unchanged >= STUCK_PAGE_LIMIT) {
        const validationErrors = (await repo.collectValidationErrors()).map(ValidationError.fromObject);
        validationErrors.forEach((validationError) => this.logger.warn(validationError.toString()));
        return {
          status: 'failed',
          message: `Page did not advance after ${STUCK_PAGE_LIMIT} attempts`,
          validationErrors,
        };
      }
    }

    return { status: 'failed', message: `Reached the step limit of ${options.maxSteps}`, validationErrors: [] };
  }

  private finish(
    submission: RespondentSubmissionEntity,
    progress: Progress,
    status: SubmissionStatus,
    message: string,
    validationErrors: IValidationError[]
  ): RespondentSubmissionEntity {
    return submission.withResult({
      status,
      message,
      pagesVisited: progress.pagesVisited,
      actionsPerformed: progress.actionsPerformed,
      validationErrors,
      finishedAt: new Date(),
    });
  }
}
