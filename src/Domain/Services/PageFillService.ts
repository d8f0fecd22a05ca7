import { FillAction } from '../Entities/FillAction';
import { RespondentEntity } from '../Entities/Respondent';
import { SurveyMappingEntity } from '../Entities/SurveyMapping';
import { ISurveyPageRepository } from '../Repositories/ISurveyPageRepository';
import { Logger } from '../../Infrastucture/logging/Logger';
import { ActionPlanService } from './ActionPlanService';
import { FormUtils } from './FormUtils';

export interface PageFillOptions {
  humanDelayMs: number;
}

/**
 * Service for filling the survey page that is currently open.
 * It runs the respondent's action plan and acts only on controls the page actually shows,
 * so the same plan can be replayed on every page of a multi-page survey.
 */
export class PageFillService {
  constructor(
    private readonly surveyPageRepository: ISurveyPageRepository,
    private readonly actionPlanService: ActionPlanService,
    private readonly logger: Logger
  ) {}

  /**
   * Returns the number of actions that took effect on this page.
   */
  async fillCurrentPage(
    mapping: SurveyMappingEntity,
    respondent: RespondentEntity,
    options: PageFillOptions
  ): Promise<number> {
    const actions = this.actionPlanService.buildActionPlan(mapping, respondent);
    return this.executeActions(actions, options);
  }

  async executeActions(actions: FillAction[], options: PageFillOptions): Promise<number> {
    let performed = 0;

    for (const action of actions) {
      if (await this.execute(action, options)) {
        performed++;
        await this.surveyPageRepository.wait(FormUtils.jitter(options.humanDelayMs));
      }
    }

    return performed;
  }

  private async execute(action: FillAction, options: PageFillOptions): Promise<boolean> {
    switch (action.kind) {
      case 'type':
        return this.typeInto(action, options);
      case 'click':
        return this.clickRadio(action);
      case 'check':
        return this.checkBox(action);
      case 'combobox':
        return this.chooseOption(action);
      case 'skip':
        if (action.unmatched) {
          this.logger.warn(`${action.csv}: no option for ${action.unmatched.map((token) => `"${token}"`).join(', ')}`);
        } else {
          this.logger.debug(`${action.csv}: ${action.reason}`);
        }
        return false;
      case 'navigate':
      case 'info':
        return false;
    }
  }

  private async typeInto(
    action: Extract<FillAction, { kind: 'type' }>,
    options: PageFillOptions
  ): Promise<boolean> {
    const repo = this.surveyPageRepository;
    const target =
      action.preferSelector && (await repo.count(action.preferSelector)) > 0
        ? action.preferSelector
        : action.selector;

    if (!(await repo.isVisible(target))) {
      return false;
    }

    if (await repo.typeText(target, action.value, options.humanDelayMs)) {
      this.logger.debug(`Typed ${action.csv} into ${target}`);
      return true;
    }

    if (action.fallbackSelector && (await repo.fillValue(action.fallbackSelector, action.value))) {
      this.logger.debug(`Filled ${action.csv} through ${action.fallbackSelector}`);
      return true;
    }

    this.logger.warn(`Could not type ${action.csv} into ${target}`);
    return false;
  }

  private async clickRadio(action: Extract<FillAction, { kind: 'click' }>): Promise<boolean> {
    const repo = this.surveyPageRepository;
    if ((await repo.count(`input[type='radio'][name='${action.group}']`)) === 0) {
      return false;
    }

    if (!(await repo.click(action.selector))) {
      this.logger.warn(`Radio ${action.selector} for ${action.csv}="${action.csvValue}" could not be clicked`);
      return false;
    }

    this.logger.debug(`Selected "${action.label}" for ${action.csv}`);
    if (action.pauseAfterMs) {
      await repo.wait(action.pauseAfterMs);
    }
    return true;
  }

  private async checkBox(action: Extract<FillAction, { kind: 'check' }>): Promise<boolean> {
    const repo = this.surveyPageRepository;
    if ((await repo.count(`input[type='checkbox'][name='${action.group}']`)) === 0) {
      return false;
    }

    if (!(await repo.check(action.selector))) {
      this.logger.warn(`Checkbox ${action.selector} for ${action.csv} could not be clicked`);
      return false;
    }

    this.logger.debug(`Checked "${action.label}" for ${action.csv}`);
    return true;
  }

  private async chooseOption(action: Extract<FillAction, { kind: 'combobox' }>): Promise<boolean> {
    const repo = this.surveyPageRepository;
    if (!(await repo.isVisible(`div[role='combobox']#${action.comboId}`))) {
      return false;
    }

    if (!(await repo.chooseComboboxOption(action.comboId, action.visibleText))) {
      this.logger.warn(`No option matching "${action.visibleText}" in combobox ${action.comboId}`);
      return false;
    }
    return true;
  }
}
