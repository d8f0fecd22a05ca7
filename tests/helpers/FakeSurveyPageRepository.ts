import { IValidationError } from '../../src/Domain/Repositories/IValidationError';
import { ISurveyPageRepository, QuestionSnapshot } from '../../src/Domain/Repositories/ISurveyPageRepository';
import { FormUtils } from '../../src/Domain/Services/FormUtils';

export interface FakePage {
  signature: string;
  questionIds: string[];
  radioGroups?: string[];
  checkboxGroups?: string[];
  /** selectors that are rendered and visible */
  visible?: string[];
  /** selectors that match but are hidden */
  present?: string[];
  comboboxOptions?: Record<string, string[]>;
  nextAvailable?: boolean;
  /** false keeps the survey on this page when Next is clicked */
  advances?: boolean;
  text?: string;
  validationErrors?: IValidationError[];
  questions?: QuestionSnapshot[];
}

/**
 * Scripted stand-in for the browser. Pages are visited in order; every action is recorded in `calls`.
 */
export class FakeSurveyPageRepository implements ISurveyPageRepository {
  readonly calls: string[] = [];
  readonly waits: number[] = [];
  readonly initializedWith: boolean[] = [];
  readonly failTyping = new Set<string>();
  /** selectors of checked boxes; `click` toggles them like a browser does */
  readonly checked = new Set<string>();
  failNavigations = 0;
  closed = false;
  private index = 0;

  constructor(private readonly pages: FakePage[]) {}

  get page(): FakePage {
    return this.pages[this.index];
  }

  advance(): void {
    this.index = Math.min(this.index + 1, this.pages.length - 1);
  }

  async initialize(headless: boolean): Promise<void> {
    this.initializedWith.push(headless);
  }

  async navigateToPage(url: string): Promise<void> {
    this.calls.push(`navigate ${url}`);
    if (this.failNavigations > 0) {
      this.failNavigations--;
      throw new Error('net::ERR_CONNECTION_RESET');
    }
    this.index = 0;
  }

  async waitForSelector(selector: string): Promise<boolean> {
    this.calls.push(`wait-for ${selector}`);
    return true;
  }

  currentUrl(): string {
    return `https://example.test/survey#${this.index}`;
  }

  async isVisible(selector: string): Promise<boolean> {
    return (this.page.visible ?? []).includes(selector);
  }

  async count(selector: string): Promise<number> {
    const group = /^input\[type='(radio|checkbox)'\]\[name='(.+)'\]$/.exec(selector);
    if (group) {
      const groups = group[1] === 'radio' ? this.page.radioGroups : this.page.checkboxGroups;
      return (groups ?? []).includes(group[2]) ? 1 : 0;
    }
    return [...(this.page.visible ?? []), ...(this.page.present ?? [])].filter((s) => s === selector).length;
  }

  async click(selector: string): Promise<boolean> {
    this.calls.push(`click ${selector}`);
    if (this.checked.has(selector)) {
      this.checked.delete(selector);
    } else {
      this.checked.add(selector);
    }
    return true;
  }

  async check(selector: string): Promise<boolean> {
    this.calls.push(`check ${selector}`);
    this.checked.add(selector);
    return true;
  }

  async typeText(selector: string, text: string): Promise<boolean> {
    this.calls.push(`type ${selector}=${text}`);
    return !this.failTyping.has(selector);
  }

  async fillValue(selector: string, text: string): Promise<boolean> {
    this.calls.push(`fill ${selector}=${text}`);
    return true;
  }

  async chooseComboboxOption(comboId: string, visibleText: string): Promise<boolean> {
    this.calls.push(`combobox ${comboId}=${visibleText}`);
    const options = this.page.comboboxOptions?.[comboId] ?? [];
    return FormUtils.pickOptionIndex(options, visibleText) >= 0;
  }

  async questionIds(): Promise<string[]> {
    return this.page.questionIds;
  }

  async pageSignature(): Promise<string> {
    return this.page.signature;
  }

  async isNextAvailable(): Promise<boolean> {
    return this.page.nextAvailable ?? true;
  }

  async clickNextAndWait(): Promise<void> {
    this.calls.push('next');
    if (this.page.advances !== false) {
      this.advance();
    }
  }

  async containsText(text: string): Promise<boolean> {
    return (this.page.text ?? '').includes(text);
  }

  async collectValidationErrors(): Promise<IValidationError[]> {
    return this.page.validationErrors ?? [];
  }

  async scanQuestions(): Promise<QuestionSnapshot[]> {
    return this.page.questions ?? [];
  }

  async wait(ms: number): Promise<void> {
    this.waits.push(ms);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
