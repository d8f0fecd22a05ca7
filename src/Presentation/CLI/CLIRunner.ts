import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { SurveyAutofillController } from '../controllers/SurveyAutofillController';
import { SurveyRunConfig } from '../../Application/Interfaces/ISurveyAutomation';
import { IUserInterface } from '../../Application/Interfaces/IUserInterface';
import { LoadSurveyInputUseCase } from '../../Application/Use-Cases/LoadSurveyInput';
import { PlanRespondentActionsUseCase } from '../../Application/Use-Cases/PlanRespondentActions';
import { InspectSurveyPageUseCase } from '../../Application/Use-Cases/InspectSurveyPage';
import { ISurveyPageRepository } from '../../Domain/Repositories/ISurveyPageRepository';
import { RowSelectionService } from '../../Domain/Services/RowSelectionService';
import { Configuration } from '../../Infrastucture/config/Configurations';
import { Logger } from '../../Infrastucture/logging/Logger';

/**
 * CLIRunner class for the `survey-autofill` command line.
 * It parses arguments with commander, dispatches to the run, plan and inspect flows,
 * and turns their outcome into a process exit code.
 */

export function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(`"${value}" is not an integer.`);
  }
  return parseInt(value, 10);
}

interface RunOptions {
  csv: string;
  mapping: string;
  startUrl?: string;
  rowIndex?: number;
  startRow?: number;
  limit?: number;
  humanDelay?: number;
  headful?: boolean;
  manualContinue?: boolean;
  debug?: boolean;
  allowMissingColumns?: boolean;
  report?: string;
}

interface PlanOptions {
  csv: string;
  mapping: string;
  rowIndex?: number;
  startUrl?: string;
  allowMissingColumns?: boolean;
}

interface InspectOptions {
  startUrl?: string;
  headful?: boolean;
  output?: string;
}

export interface CLIDependencies {
  controller: SurveyAutofillController;
  loadSurveyInput: LoadSurveyInputUseCase;
  planRespondentActions: PlanRespondentActionsUseCase;
  inspectSurveyPage: InspectSurveyPageUseCase;
  rowSelectionService: RowSelectionService;
  surveyPageRepository: ISurveyPageRepository;
}

export class CLIRunner {
  private exitCode = 0;

  constructor(
    private readonly deps: CLIDependencies,
    private readonly userInterface: IUserInterface,
    private readonly config: Configuration,
    private readonly logger: Logger
  ) {}

  buildProgram(): Command {
    const program = new Command();

    program
      .name('survey-autofill')
      .description('📝 Fill a Qualtrics survey once per CSV row from a column-to-field mapping')
      .version('1.0.0')
      .exitOverride();

    program
      .command('run')
      .description('Submit the survey for the selected CSV rows')
      .requiredOption('--csv <file>', 'respondent CSV export')
      .requiredOption('--mapping <file>', 'column-to-field mapping JSON')
      .option('--start-url <url>', 'survey URL with its token (overrides mapping and SURVEY_URL)')
      .option('--row-index <n>', 'process only this 0-based data row', parseInteger)
      .option('--start-row <n>', 'first 0-based data row to process', parseInteger)
      .option('--limit <n>', 'maximum number of rows to process', parseInteger)
      .option('--human-delay <ms>', 'base per-character typing delay', parseInteger)
      .option('--headful', 'show the browser window')
      .option('--manual-continue', 'pause after each filled page so Next can be clicked by hand')
      .option('--debug', 'log at debug level')
      .option('--allow-missing-columns', 'read mapped columns missing from the CSV as empty')
      .option('--report <file>', 'write a JSON report of every row')
      .action(async (options: RunOptions) => {
        this.exitCode = await this.runSurvey(options);
      });

    program
      .command('plan')
      .description('Print the actions one row would produce, without a browser')
      .requiredOption('--csv <file>', 'respondent CSV export')
      .requiredOption('--mapping <file>', 'column-to-field mapping JSON')
      .option('--row-index <n>', '0-based data row to plan', parseInteger)
      .option('--start-url <url>', 'survey URL to show as the first step')
      .option('--allow-missing-columns', 'read mapped columns missing from the CSV as empty')
      .action(async (options: PlanOptions) => {
        this.exitCode = await this.planRow(options);
      });

    program
      .command('inspect')
      .description('Open the survey and list the controls on each page you step through')
      .option('--start-url <url>', 'survey URL with its token (overrides SURVEY_URL)')
      .option('--headful', 'show the browser window')
      .option('--output <file>', 'write the pages inspected in this session to this JSON file, replacing it')
      .action(async (options: InspectOptions) => {
        this.exitCode = await this.inspect(options);
      });

    return program;
  }

  async run(argv: string[]): Promise<number> {
    try {
      await this.buildProgram().parseAsync(argv);
      return this.exitCode;
    } catch (error) {
      if (error instanceof CommanderError) {
        // commander has already printed usage or help
        return error.exitCode;
      }
      this.logger.error('CLI execution failed:', error);
      await this.userInterface.showMessage(
        `💥 Unexpected error: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
      return 1;
    } finally {
      await this.userInterface.close();
    }
  }

  private async runSurvey(options: RunOptions): Promise<number> {
    if (options.debug) {
      this.logger.setLevel('debug');
    }

    const runConfig: SurveyRunConfig = {
      csvPath: options.csv,
      mappingPath: options.mapping,
      startUrl: options.startUrl,
      rowIndex: options.rowIndex,
      startRow: options.startRow,
      limit: options.limit,
      humanDelayMs: options.humanDelay,
      headless: options.headful ? false : undefined,
      manualContinue: options.manualContinue ?? false,
      allowMissingColumns: options.allowMissingColumns ?? false,
      reportPath: options.report,
    };

    const result = await this.deps.controller.run(runConfig);

    if (result.error) {
      await this.userInterface.showMessage(`❌ ${result.error}`);
    }

    await this.userInterface.showTable({
      Completed: result.totals.completed,
      Failed: result.totals.failed,
      Halted: result.totals.halted,
      Skipped: result.totals.skipped,
      Total: result.submissions.length,
    });

    return result.success ? 0 : 1;
  }

  private async planRow(options: PlanOptions): Promise<number> {
    const loaded = await this.deps.loadSurveyInput.execute({
      csvPath: options.csv,
      mappingPath: options.mapping,
      allowMissingColumns: options.allowMissingColumns,
    });
    if (!loaded.success || !loaded.input) {
      await this.userInterface.showMessage(`❌ ${loaded.error ?? 'Survey input could not be loaded'}`);
      return 1;
    }
    const { respondents, mapping, match } = loaded.input;

    let rowIndex: number;
    try {
      [rowIndex] = this.deps.rowSelectionService.select(respondents.length, { rowIndex: options.rowIndex ?? 0 });
    } catch (error) {
      await this.userInterface.showMessage(`❌ ${error instanceof Error ? error.message : 'Invalid row'}`);
      return 1;
    }

    const plan = await this.deps.planRespondentActions.execute({
      mapping,
      respondent: respondents[rowIndex],
      startUrl: options.startUrl ?? mapping.startUrl ?? this.config.surveyUrl,
    });
    if (!plan.success) {
      await this.userInterface.showMessage(`❌ ${plan.error ?? 'Plan could not be built'}`);
      return 1;
    }

    if (match.missing.length > 0) {
      await this.userInterface.showMessage(`⚠️  Columns missing from the CSV: ${match.missing.join(', ')}`);
    }
    await this.userInterface.showMessage(`🧭 Plan for row ${rowIndex} (${plan.actions.length} actions):`);
    await this.userInterface.showLines(plan.lines);
    return 0;
  }

  private async inspect(options: InspectOptions): Promise<number> {
    const startUrl = options.startUrl ?? this.config.surveyUrl;
    if (!startUrl) {
      await this.userInterface.showMessage('❌ No start URL: pass --start-url or set SURVEY_URL');
      return 1;
    }

    const repository = this.deps.surveyPageRepository;
    try {
      await repository.initialize(options.headful ? false : this.config.headlessMode);
      const result = await this.deps.inspectSurveyPage.execute({
        startUrl,
        pageTimeout: this.config.pageTimeout,
        outputPath: options.output,
      });

      if (!result.success) {
        await this.userInterface.showMessage(`❌ ${result.error ?? 'Inspection failed'}`);
        return 1;
      }
      await this.userInterface.showMessage(`✅ Inspected ${result.pagesInspected} page(s)`);
      return 0;
    } finally {
      await repository.close();
    }
  }
}
