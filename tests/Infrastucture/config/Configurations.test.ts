import { describe, it, expect } from 'vitest';
import { Configuration, ConfigurationError } from '../../../src/Infrastucture/config/Configurations';

describe('Configuration', () => {
  it('applies defaults', () => {
    const config = new Configuration({});

    expect(config.surveyUrl).toBeUndefined();
    expect(config.chromeExecutablePath).toBeUndefined();
    expect(config.headlessMode).toBe(true);
    expect(config.pageTimeout).toBe(30000);
    expect(config.humanDelayMs).toBe(55);
    expect(config.maxSteps).toBe(120);
    expect(config.maxRowAttempts).toBe(2);
    expect(config.completionText).toBe('Thank you');
    expect(config.logLevel).toBe('info');
    expect(config.logFile).toBe('survey-autofill.log');
  });

  it('reads overrides and treats blanks as unset', () => {
    const config = new Configuration({
      SURVEY_URL: 'https://example.test/jfe/form/SV_test?RID=test-token',
      HEADLESS_MODE: 'false',
      HUMAN_DELAY_MS: '0',
      MAX_STEPS: ' ',
      LOG_LEVEL: 'debug',
      LOG_FILE: '',
    });

    expect(config.surveyUrl).toBe('https://example.test/jfe/form/SV_test?RID=test-token');
    expect(config.headlessMode).toBe(false);
    expect(config.humanDelayMs).toBe(0);
    expect(config.maxSteps).toBe(120);
    expect(config.logLevel).toBe('debug');
    expect(config.logFile).toBeUndefined();
  });

  it('lists every invalid variable', () => {
    let caught: unknown;
    try {
      new Configuration({ HEADLESS_MODE: 'yes', MAX_ROW_ATTEMPTS: '0', SURVEY_URL: 'survey' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    const issues = caught instanceof ConfigurationError ? caught.issues : [];
    expect(issues).toContain('SURVEY_URL: SURVEY_URL must be a valid URL');
    expect(issues).toContain('HEADLESS_MODE: HEADLESS_MODE must be "true" or "false"');
    expect(issues).toContain('MAX_ROW_ATTEMPTS: MAX_ROW_ATTEMPTS must be at least 1');
  });

  it('rejects numbers that are not whole', () => {
    expect(() => new Configuration({ PAGE_TIMEOUT: '1.5' })).toThrow('PAGE_TIMEOUT must be a whole number');
  });
});
