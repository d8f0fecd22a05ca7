import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { CLIRunner, parseInteger } from '../../../src/Presentation/CLI/CLIRunner';
import { SurveyAutofillController, emptyTotals } from '../../../src/Presentation/controllers/SurveyAutofillController';
import { FillRespondentUseCase } from '../../../src/Application/Use-Cases/FillRespondent';
import { InspectSurveyPageUseCase } from '../../../src/Application/Use-Cases/InspectSurveyPage';
import { LoadSurveyInputUseCase } from '../../../src/Application/Use-Cases/LoadSurveyInput';
import { PlanRespondentActionsUseCase } from '../../../src/Application/Use-Cases/PlanRespondentActions';
import { ActionPlanService } from '../../../src/Domain/Services/ActionPlanService';
import { HeaderMatchingService } from '../../../src/Domain/Services/HeaderMatchingService';
import { PageFillService } from '../../../src/Domain/Services/PageFillService';
import { RowSelectionService } from '../../../src/Domain/Services/RowSelectionService';
import { Configuration } from '../../../src/Infrastucture/config/Configurations';
import { FakeSurveyPageRepository } from '../../helpers/FakeSurveyPageRepository';
import { FakeUserInterface } from '../../helpers/FakeUserInterface';
import { silentLogger } from '../../helpers/fixtures';

const argv = (...args: string[]) => ['node', 'survey-autofill', ...args];

describe('parseInteger', () => {
  it('accepts whole numbers', () => {
    expect(parseInteger('42')).toBe(42);
    expect(parseInteger(' 7 ')).toBe(7);
  });

  it('rejects anything else', () => {
    expect(() => parseInteger('4.5')).toThrow(InvalidArgumentError);
    expect(() => parseInteger('12abc')).toThrow('"12abc" is not an integer.');
  });
});

describe('CLIRunner', () => {
  let dir: string;
  let csvPath: string;
  let mappingPath: string;
  let userInterface: FakeUserInterface;
  let controller: SurveyAutofillController;
  let runner: CLIRunner;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'survey-cli-'));
    csvPath = path.join(dir, 'people.csv');
    mappingPath = path.join(dir, 'mapping.json');
    writeFileSync(csvPath, 'First Name,Notes\nAda,first\nBea,\n', 'utf8');
    writeFileSync(
      mappingPath,
      JSON.stringify({ text: [{ csv: 'First Name', id: 'form-text-input-QID9-1' }] }),
      'utf8'
    );

    const logger = silentLogger();
    const config = new Configuration({ LOG_FILE: '', SURVEY_URL: 'https://example.test/survey' });
    const repository = new FakeSurveyPageRepository([{ signature: '', questionIds: [] }]);
    const actionPlanService = new ActionPlanService();
    const rowSelectionService = new RowSelectionService();
    const loadSurveyInput = new LoadSurveyInputUseCase(new HeaderMatchingService(), logger);
    userInterface = new FakeUserInterface(['q']);

    controller = new SurveyAutofillController(
      repository,
      loadSurveyInput,
      new FillRespondentUseCase(
        repository,
        new PageFillService(repository, actionPlanService, logger),
        userInterface,
        logger
      ),
      rowSelectionService,
      userInterface,
      config,
      logger
    );

    runner = new CLIRunner(
      {
        controller,
        loadSurveyInput,
        planRespondentActions: new PlanRespondentActionsUseCase(actionPlanService),
        inspectSurveyPage: new InspectSurveyPageUseCase(repository, userInterface, logger),
        rowSelectionService,
        surveyPageRepository: repository,
      },
      userInterface,
      config,
      logger
    );
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('prints the plan for one row', async () => {
    const exitCode = await runner.run(argv('plan', '--csv', csvPath, '--mapping', mappingPath, '--row-index', '1'));

    expect(exitCode).toBe(0);
    expect(userInterface.messages).toEqual(['🧭 Plan for row 1 (3 actions):']);
    expect(userInterface.lines).toEqual([
      '01. NAVIGATE → https://example.test/survey',
      '02. TYPE     #form-text-input-QID9-1  ←  "Bea"   (csv: First Name)',
      '03. INFO     CSV columns not referenced in mapping: Notes',
    ]);
    expect(userInterface.closed).toBe(true);
  });

  it('fails the plan for a row outside the CSV', async () => {
    const exitCode = await runner.run(argv('plan', '--csv', csvPath, '--mapping', mappingPath, '--row-index', '5'));

    expect(exitCode).toBe(1);
    expect(userInterface.messages).toEqual(['❌ Row index 5 out of range (0..1)']);
  });

  it('passes run options to the controller and reports the totals', async () => {
    const run = vi.spyOn(controller, 'run').mockResolvedValue({
      submissions: [],
      totals: { ...emptyTotals(), completed: 1, halted: 1 },
      success: false,
    });

    const exitCode = await runner.run(
      argv('run', '--csv', csvPath, '--mapping', mappingPath, '--start-row', '1', '--limit', '2', '--headful', '--manual-continue')
    );

    expect(exitCode).toBe(1);
    expect(run).toHaveBeenCalledWith({
      csvPath,
      mappingPath,
      startUrl: undefined,
      rowIndex: undefined,
      startRow: 1,
      limit: 2,
      humanDelayMs: undefined,
      headless: false,
      manualContinue: true,
      allowMissingColumns: false,
      reportPath: undefined,
    });
    expect(userInterface.tables).toEqual([{ Completed: 1, Failed: 0, Halted: 1, Skipped: 0, Total: 0 }]);
  });

  it('exits 0 when every row completed', async () => {
    vi.spyOn(controller, 'run').mockResolvedValue({
      submissions: [],
      totals: { ...emptyTotals(), completed: 2 },
      success: true,
    });

    expect(await runner.run(argv('run', '--csv', csvPath, '--mapping', mappingPath))).toBe(0);
  });

  it('treats a non-integer option as a usage error', async () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    const exitCode = await runner.run(argv('run', '--csv', csvPath, '--mapping', mappingPath, '--limit', 'ten'));

    expect(exitCode).toBe(1);
    expect(stderr).toHaveBeenCalled();
  });

  it('describes inspect --output as replacing the file', () => {
    const inspect = runner.buildProgram().commands.find((command) => command.name() === 'inspect');
    const output = inspect?.options.find((option) => option.long === '--output');

    expect(output?.description).toBe('write the pages inspected in this session to this JSON file, replacing it');
  });

  it('inspects until the operator quits', async () => {
    const exitCode = await runner.run(argv('inspect'));

    expect(exitCode).toBe(0);
    expect(userInterface.messages).toEqual(['✅ Inspected 0 page(s)']);
  });
});
