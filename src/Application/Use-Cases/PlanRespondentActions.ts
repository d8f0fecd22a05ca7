import { FillAction } from '../../Domain/Entities/FillAction';
import { RespondentEntity } from '../../Domain/Entities/Respondent';
import { SurveyMappingEntity } from '../../Domain/Entities/SurveyMapping';
import { ActionPlanService } from '../../Domain/Services/ActionPlanService';

/**
 * Use case for the dry run: what would be typed and clicked for one respondent.
 */

export interface PlanRespondentActionsRequest {
  mapping: SurveyMappingEntity;
  respondent: RespondentEntity;
  startUrl?: string;
}

export interface PlanRespondentActionsResponse {
  actions: FillAction[];
  lines: string[];
  success: boolean;
  error?: string;
}

export class PlanRespondentActionsUseCase {
  constructor(private readonly actionPlanService: ActionPlanService) {}

  async execute(request: PlanRespondentActionsRequest): Promise<PlanRespondentActionsResponse> {
    try {
      const actions = this.actionPlanService.buildActionPlan(request.mapping, request.respondent, request.startUrl);
      return {
        actions,
        lines: this.actionPlanService.formatActionPlan(actions),
        success: true,
      };
    } catch (error) {
      return {
        actions: [],
        lines: [],
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error occurred',
      };
    }
  }
}
