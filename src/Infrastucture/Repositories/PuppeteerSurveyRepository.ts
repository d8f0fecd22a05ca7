import puppeteer, { Browser, ElementHandle, Page } from 'puppeteer-core';
import { IValidationError } from '../../Domain/Repositories/IValidationError';
import { ISurveyPageRepository, QuestionSnapshot } from '../../Domain/Repositories/ISurveyPageRepository';
import { FormUtils } from '../../Domain/Services/FormUtils';
import { Logger } from '../logging/Logger';

const QUESTION_SECTION = "section.question[id^='question-QID']";
const NEXT_BUTTON = '#next-button';
const NEXT_POLLS = 40;
const NEXT_POLL_MS = 150;

export class PuppeteerSurveyRepository implements ISurveyPageRepository {
  private browser: Browser | null = null;
  private page: Page | null = null;

  constructor(
    private readonly logger: Logger,
    private readonly executablePath?: string
  ) {}

  async initialize(headless: boolean = true): Promise<void> {
    if (!this.executablePath) {
      throw new Error('CHROME_EXECUTABLE_PATH is not set; puppeteer-core needs a Chrome or Chromium binary');
    }

    try {
      this.browser = await puppeteer.launch({
        executablePath: this.executablePath,
        headless,
        args: ['--no-sandbox', '--disable-setuid-sandbox', '--disable-blink-features=AutomationControlled'],
        defaultViewport: { width: 1360, height: 900 },
      });

      this.page = await this.browser.newPage();

      this.logger.info('Browser initialized successfully');
    } catch (error) {
      this.logger.error('Failed to initialize browser:', error);
      throw error;
    }
  }

  async navigateToPage(url: string, timeout: number = 30000): Promise<void> {
    const page = this.requirePage();

    try {
      await page.goto(url, {
        waitUntil: 'networkidle2',
        timeout,
      });
      this.logger.info(`Successfully navigated to: ${url}`);
    } catch (error) {
      this.logger.error(`Failed to navigate to ${url}:`, error);
      throw error;
    }
  }

  async waitForSelector(selector: string, timeout: number): Promise<boolean> {
    try {
      await this.requirePage().waitForSelector(selector, { timeout });
      return true;
    } catch (error) {
      this.logger.debug(`Timed out waiting for ${selector}`, error);
      return false;
    }
  }

  currentUrl(): string {
    return this.requirePage().url();
  }

  async isVisible(selector: string): Promise<boolean> {
    const handle = await this.requirePage().$(selector);
    if (!handle) return false;
    try {
      return await handle.isVisible();
    } finally {
      await handle.dispose();
    }
  }

  async count(selector: string): Promise<number> {
    return this.requirePage().$$eval(selector, (elements) => elements.length);
  }

  async click(selector: string): Promise<boolean> {
    const handle = await this.requirePage().$(selector);
    if (!handle) return false;

    try {
      await handle.scrollIntoView();
      try {
        await handle.click();
      } catch (error) {
        // Qualtrics hides the native inputs behind styled labels.
        this.logger.debug(`Direct click on ${selector} failed, dispatching instead`, error);
        await handle.evaluate((el) => {
          if (el instanceof HTMLElement) el.click();
        });
      }
      await this.delay(FormUtils.jitter(80));
      return true;
    } catch (error) {
      this.logger.warn(`Failed to click ${selector}:`, error);
      return false;
    } finally {
      await handle.dispose();
    }
  }

  async check(selector: string): Promise<boolean> {
    const handle = await this.requirePage().$(selector);
    if (!handle) return false;

    let checked: boolean;
    try {
      checked = await handle.evaluate((el) => el instanceof HTMLInputElement && el.checked);
    } catch (error) {
      this.logger.warn(`Failed to read the state of ${selector}:`, error);
      return false;
    } finally {
      await handle.dispose();
    }

    if (checked) {
      this.logger.debug(`${selector} is already checked`);
      return true;
    }
    return this.click(selector);
  }

  async typeText(selector: string, text: string, perCharMs: number): Promise<boolean> {
    const page = this.requirePage();
    const handle = await page.$(selector);
    if (!handle) return false;

    try {
      await handle.scrollIntoView();
      await handle.click();
      await handle.evaluate((el) => {
        if (el instanceof HTMLInputElement || el instanceof HTMLTextAreaElement) el.value = '';
      });

      for (const char of text) {
        await page.keyboard.type(char);
        await this.delay(FormUtils.jitter(perCharMs));
      }
      await page.keyboard.press('Tab');

      const typed = await handle.evaluate((el) =>
        el instanceof HTMLInputElement || el instanceof HTMLTextAreaElement ? el.value : ''
      );
      if (FormUtils.normSpace(typed) !== FormUtils.normSpace(text)) {
        this.logger.debug(`Typed value of ${selector} did not stick, setting it directly`);
        await this.setValue(handle, text);
      }

      await handle.evaluate((el) => {
        if (el instanceof HTMLElement) el.blur();
      });
      return true;
    } catch (error) {
      this.logger.warn(`Failed to type into ${selector}:`, error);
      return false;
    } finally {
      await handle.dispose();
    }
  }

  async fillValue(selector: string, text: string): Promise<boolean> {
    const handle = await this.requirePage().$(selector);
    if (!handle) return false;
    try {
      return await this.setValue(handle, text);
    } finally {
      await handle.dispose();
    }
  }

  async chooseComboboxOption(comboId: string, visibleText: string): Promise<boolean> {
    const page = this.requirePage();
    if (!(await this.click(`div[role='combobox']#${comboId}`))) {
      return false;
    }

    const menuItems = `ul#select-menu-${comboId} li.menu-item`;
    if (!(await this.waitForSelector(menuItems, 3000))) {
      await page.keyboard.press('Escape');
      return false;
    }

    const options = await page.$$eval(menuItems, (items) => items.map((item) => (item.textContent ?? '').trim()));
    const index = FormUtils.pickOptionIndex(options, visibleText);
    if (index < 0) {
      this.logger.debug(`Combobox ${comboId} options: ${options.join(' | ')}`);
      await page.keyboard.press('Escape');
      return false;
    }

    const items = await page.$$(menuItems);
    try {
      await items[index].click();
      this.logger.debug(`Chose "${options[index]}" in combobox ${comboId}`);
      return true;
    } finally {
      await Promise.all(items.map((item) => item.dispose()));
    }
  }

  async questionIds(): Promise<string[]> {
    return this.requirePage().$$eval(QUESTION_SECTION, (sections) => sections.map((section) => section.id));
  }

  async pageSignature(): Promise<string> {
    return this.requirePage().evaluate((sectionSelector) => {
      return Array.from(document.querySelectorAll(`${sectionSelector} .question-display`))
        .filter((el) => el instanceof HTMLElement && el.offsetParent !== null)
        .map((el) => (el.textContent ?? '').replace(/\s+/g, ' ').trim())
        .join(' || ');
    }, QUESTION_SECTION);
  }

  async isNextAvailable(): Promise<boolean> {
    return this.requirePage().evaluate((buttonSelector) => {
      const button = document.querySelector(buttonSelector);
      if (!(button instanceof HTMLElement)) return false;
      const disabled = button.hasAttribute('disabled') || button.getAttribute('aria-disabled') === 'true';
      return !disabled && button.offsetParent !== null;
    }, NEXT_BUTTON);
  }

  async clickNextAndWait(): Promise<void> {
    const page = this.requirePage();
    const before = (await this.questionIds()).join(',');

    await page.click(NEXT_BUTTON);
    try {
      await page.waitForNetworkIdle({ idleTime: 300, timeout: 10000 });
    } catch (error) {
      this.logger.debug('Network did not settle after Next', error);
    }

    for (let poll = 0; poll < NEXT_POLLS; poll++) {
      if ((await this.questionIds()).join(',') !== before) return;
      await this.delay(NEXT_POLL_MS);
    }
    this.logger.debug('Question set unchanged after Next');
  }

  async containsText(text: string): Promise<boolean> {
    return this.requirePage().evaluate((wanted) => (document.body?.innerText ?? '').includes(wanted), text);
  }

  async collectValidationErrors(): Promise<IValidationError[]> {
    return this.requirePage().evaluate((sectionSelector) => {
      const errors: IValidationError[] = [];
      document.querySelectorAll(sectionSelector).forEach((section) => {
        const messages = Array.from(section.querySelectorAll('.validation-error, .error-message, [role="alert"]'))
          .map((el) => (el.textContent ?? '').trim())
          .filter((message) => message.length > 0);
        if (messages.length === 0) return;

        errors.push({
          sectionId: section.id,
          heading: (section.querySelector('.question-display')?.textContent ?? '').trim(),
          errorMessage: messages.join(' '),
        });
      });
      return errors;
    }, QUESTION_SECTION);
  }

  async scanQuestions(): Promise<QuestionSnapshot[]> {
    return this.requirePage().evaluate((sectionSelector) => {
      const labelFor = (input: HTMLInputElement): string => {
        const label = input.id ? document.querySelector(`label[for="${CSS.escape(input.id)}"]`) : null;
        return (label?.textContent ?? input.value).replace(/\s+/g, ' ').trim();
      };
      const choice = (input: HTMLInputElement) => ({
        id: input.id,
        name: input.name,
        value: input.value,
        label: labelFor(input),
        checked: input.checked,
      });

      return Array.from(document.querySelectorAll(sectionSelector))
        .filter((section) => section instanceof HTMLElement && section.offsetParent !== null)
        .map((section): QuestionSnapshot => {
          const inputs = Array.from(section.querySelectorAll('input')).filter(
            (el): el is HTMLInputElement => el instanceof HTMLInputElement
          );
          const qid = /question-(QID\d+)/.exec(section.id);

          return {
            sectionId: section.id,
            qid: qid ? qid[1] : null,
            heading: (section.querySelector('.question-display')?.textContent ?? '').replace(/\s+/g, ' ').trim(),
            radios: inputs.filter((input) => input.type === 'radio').map(choice),
            checkboxes: inputs.filter((input) => input.type === 'checkbox').map(choice),
            textInputs:
              inputs.filter((input) => ['text', 'email', 'tel', 'number'].includes(input.type)).length +
              section.querySelectorAll('textarea').length,
            comboboxes: Array.from(section.querySelectorAll("div[role='combobox']")).map((combo) => ({
              id: combo.id,
              options: Array.from(document.querySelectorAll(`ul#select-menu-${combo.id} li.menu-item`)).map(
                (item) => (item.textContent ?? '').trim()
              ),
            })),
          };
        });
    }, QUESTION_SECTION);
  }

  async wait(ms: number): Promise<void> {
    await this.delay(ms);
  }

  async close(): Promise<void> {
    if (this.browser) {
      await this.browser.close();
      this.browser = null;
      this.page = null;
      this.logger.info('Browser closed');
    }
  }

  private requirePage(): Page {
    if (!this.page) throw new Error('Browser not initialized');
    return this.page;
  }

  private async setValue(handle: ElementHandle<Element>, text: string): Promise<boolean> {
    return handle.evaluate((el, value) => {
      if (!(el instanceof HTMLInputElement || el instanceof HTMLTextAreaElement)) return false;
      el.value = value;
      el.dispatchEvent(new Event('input', { bubbles: true }));
      el.dispatchEvent(new Event('change', { bubbles: true }));
      return true;
    }, text);
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
