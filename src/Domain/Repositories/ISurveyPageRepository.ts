import { IValidationError } from './IValidationError';

export interface ChoiceSnapshot {
  id: string;
  name: string;
  value: string;
  label: string;
  checked: boolean;
}

export interface QuestionSnapshot {
  sectionId: string;
  qid: string | null;
  heading: string;
  radios: ChoiceSnapshot[];
  checkboxes: ChoiceSnapshot[];
  textInputs: number;
  comboboxes: { id: string; options: string[] }[];
}

/**
 * Interface for survey page operations.
 * Presence checks are quick and never wait for elements to appear; actions report
 * whether they took effect instead of throwing for a missing control.
 */
export interface ISurveyPageRepository {
  initialize(headless: boolean): Promise<void>;
  navigateToPage(url: string, timeout?: number): Promise<void>;
  waitForSelector(selector: string, timeout: number): Promise<boolean>;
  currentUrl(): string;

  isVisible(selector: string): Promise<boolean>;
  count(selector: string): Promise<number>;
  click(selector: string): Promise<boolean>;
  /** Clicks a checkbox only when it is not already checked. */
  check(selector: string): Promise<boolean>;
  typeText(selector: string, text: string, perCharMs: number): Promise<boolean>;
  fillValue(selector: string, text: string): Promise<boolean>;
  chooseComboboxOption(comboId: string, visibleText: string): Promise<boolean>;

  questionIds(): Promise<string[]>;
  pageSignature(): Promise<string>;
  isNextAvailable(): Promise<boolean>;
  clickNextAndWait(): Promise<void>;
  containsText(text: string): Promise<boolean>;
  collectValidationErrors(): Promise<IValidationError[]>;
  scanQuestions(): Promise<QuestionSnapshot[]>;

  wait(ms: number): Promise<void>;
  close(): Promise<void>;
}
