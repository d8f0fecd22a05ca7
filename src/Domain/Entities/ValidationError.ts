import { IValidationError } from '../Repositories/IValidationError';
import { FormUtils } from '../Services/FormUtils';

/**
 * Represents a validation error reported by the survey for one question.
 */

export class ValidationError implements IValidationError {
    constructor(
        public readonly sectionId: string,
        public readonly heading: string,
        public readonly errorMessage: string
    ) {}

    static fromObject(obj: IValidationError): ValidationError {
        return new ValidationError(obj.sectionId, obj.heading, obj.errorMessage);
    }

    toString(): string {
        const heading = FormUtils.normSpace(this.heading).slice(0, 80);
        return `Question "${heading}" (${this.sectionId}): ${FormUtils.normSpace(this.errorMessage)}`;
    }
}
