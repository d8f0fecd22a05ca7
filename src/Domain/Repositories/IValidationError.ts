/**
 * Interface representing a validation message the survey shows next to a question
 */
export interface IValidationError {
    sectionId: string;
    heading: string;
    errorMessage: string;
}
