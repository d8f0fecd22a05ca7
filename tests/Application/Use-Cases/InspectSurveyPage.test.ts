import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { InspectSurveyPageUseCase, formatQuestionSnapshots } from '../../../src/Application/Use-Cases/InspectSurveyPage';
import { QuestionSnapshot } from '../../../src/Domain/Repositories/ISurveyPageRepository';
import { FakeSurveyPageRepository } from '../../helpers/FakeSurveyPageRepository';
import { FakeUserInterface } from '../../helpers/FakeUserInterface';
import { silentLogger } from '../../helpers/fixtures';

const travelQuestion: QuestionSnapshot = {
  sectionId: 'question-QID63',
  qid: 'QID63',
  heading: 'How did you get to the station?',
  radios: [
    { id: 'mc-choice-input-QID63-1', name: 'QID63', value: '1', label: 'Bus', checked: false },
    { id: 'mc-choice-input-QID63-4', name: 'QID63', value: '4', label: 'Other', checked: true },
  ],
  checkboxes: [],
  textInputs: 1,
  comboboxes: [{ id: 'QID19', options: ['Alameda', 'Oakland'] }],
};

describe('formatQuestionSnapshots', () => {
  it('lists each section with its controls', () => {
    expect(formatQuestionSnapshots([travelQuestion])).toEqual([
      '[question-QID63] QID63: How did you get to the station?',
      '    radio    #mc-choice-input-QID63-1  "Bus"',
      '    radio    #mc-choice-input-QID63-4  "Other" (checked)',
      '    combobox #QID19  [Alameda | Oakland]',
      '    text inputs: 1',
    ]);
  });

  it('says so when a page has no questions', () => {
    expect(formatQuestionSnapshots([])).toEqual(['(no question sections on this page)']);
  });
});

describe('InspectSurveyPageUseCase', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'survey-inspect-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('captures each page the operator asks for and saves them', async () => {
    const repository = new FakeSurveyPageRepository([
      { signature: 'Travel', questionIds: ['question-QID63'], questions: [travelQuestion] },
      { signature: '', questionIds: [] },
    ]);
    const userInterface = new FakeUserInterface(['', '', 'q']);
    const outputPath = path.join(dir, 'pages.json');
    const useCase = new InspectSurveyPageUseCase(repository, userInterface, silentLogger());

    const response = await useCase.execute({
      startUrl: 'https://example.test/survey',
      pageTimeout: 1000,
      outputPath,
    });

    expect(response).toEqual({ pagesInspected: 2, success: true });
    expect(repository.calls).toEqual(['navigate https://example.test/survey']);
    expect(userInterface.questions).toHaveLength(3);
    expect(userInterface.lines[0]).toBe('[question-QID63] QID63: How did you get to the station?');

    const saved = JSON.parse(readFileSync(outputPath, 'utf8'));
    expect(saved.surveyUrl).toBe('https://example.test/survey');
    expect(saved.pages).toHaveLength(2);
    expect(saved.pages[0].questions[0].sectionId).toBe('question-QID63');
    expect(saved.pages[0].url).toBe('https://example.test/survey#0');
  });

  it('replaces an existing output file with the pages of this session', async () => {
    const outputPath = path.join(dir, 'pages.json');
    writeFileSync(outputPath, JSON.stringify({ surveyUrl: 'https://example.test/old', pages: [{}, {}, {}] }), 'utf8');
    const repository = new FakeSurveyPageRepository([
      { signature: 'Travel', questionIds: ['question-QID63'], questions: [travelQuestion] },
    ]);
    const useCase = new InspectSurveyPageUseCase(repository, new FakeUserInterface(['', 'q']), silentLogger());

    const response = await useCase.execute({ startUrl: 'https://example.test/survey', pageTimeout: 1000, outputPath });

    expect(response.pagesInspected).toBe(1);
    const saved = JSON.parse(readFileSync(outputPath, 'utf8'));
    expect(saved.surveyUrl).toBe('https://example.test/survey');
    expect(saved.pages).toHaveLength(1);
  });

  it('reports a navigation failure', async () => {
    const repository = new FakeSurveyPageRepository([{ signature: '', questionIds: [] }]);
    repository.failNavigations = 1;
    const useCase = new InspectSurveyPageUseCase(repository, new FakeUserInterface(), silentLogger());

    const response = await useCase.execute({ startUrl: 'https://example.test/survey', pageTimeout: 1000 });

    expect(response).toEqual({ pagesInspected: 0, success: false, error: 'net::ERR_CONNECTION_RESET' });
  });
});
