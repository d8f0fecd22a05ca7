import { promises as fs } from 'fs';
import { IUserInterface } from '../Interfaces/IUserInterface';
import { ISurveyPageRepository, QuestionSnapshot } from '../../Domain/Repositories/ISurveyPageRepository';
import { Logger } from '../../Infrastucture/logging/Logger';

/**
 * Use case for walking a survey by hand and dumping what each page contains.
 * The operator advances the survey in the browser; every Enter captures the current page.
 */

export interface InspectSurveyPageRequest {
  startUrl: string;
  pageTimeout: number;
  outputPath?: string;
}

export interface InspectedPage {
  url: string;
  inspectedAt: string;
  questions: QuestionSnapshot[];
}

export interface InspectionDocument {
  surveyUrl: string;
  extractedAt: string;
  pages: InspectedPage[];
}

export interface InspectSurveyPageResponse {
  pagesInspected: number;
  success: boolean;
  error?: string;
}

export function formatQuestionSnapshots(questions: QuestionSnapshot[]): string[] {
  if (questions.length === 0) {
    return ['(no question sections on this page)'];
  }

  const lines: string[] = [];
  for (const question of questions) {
    lines.push(`[${question.sectionId}] ${question.qid ?? '?'}: ${question.heading}`);
    for (const radio of question.radios) {
      lines.push(`    radio    #${radio.id}  "${radio.label}"${radio.checked ? ' (checked)' : ''}`);
    }
    for (const checkbox of question.checkboxes) {
      lines.push(`    checkbox #${checkbox.id}  "${checkbox.label}"${checkbox.checked ? ' (checked)' : ''}`);
    }
    for (const combobox of question.comboboxes) {
      lines.push(`    combobox #${combobox.id}  [${combobox.options.join(' | ')}]`);
    }
    if (question.textInputs > 0) {
      lines.push(`    text inputs: ${question.textInputs}`);
    }
  }
  return lines;
}

export class InspectSurveyPageUseCase {
  constructor(
    private readonly surveyPageRepository: ISurveyPageRepository,
    private readonly userInterface: IUserInterface,
    private readonly logger: Logger
  ) {}

  async execute(request: InspectSurveyPageRequest): Promise<InspectSurveyPageResponse> {
    const document: InspectionDocument = {
      surveyUrl: request.startUrl,
      extractedAt: new Date().toISOString(),
      pages: [],
    };

    try {
      await this.surveyPageRepository.navigateToPage(request.startUrl, request.pageTimeout);

      for (;;) {
        const answer = await this.userInterface.askQuestion(
          '🔍 Press Enter to inspect the current page (q to quit):'
        );
        if (answer.toLowerCase() === 'q') break;

        const questions = await this.surveyPageRepository.scanQuestions();
        await this.userInterface.showLines(formatQuestionSnapshots(questions));

        document.pages.push({
          url: this.surveyPageRepository.currentUrl(),
          inspectedAt: new Date().toISOString(),
          questions,
        });

        if (request.outputPath) {
          await fs.writeFile(request.outputPath, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
          this.logger.info(`Saved ${document.pages.length} page(s) to ${request.outputPath}`);
        }
      }

      return { pagesInspected: document.pages.length, success: true };
    } catch (error) {
      this.logger.error('Inspection failed:', error);
      return {
        pagesInspected: document.pages.length,
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error occurred',
      };
    }
  }
}
