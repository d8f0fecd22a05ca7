/**
 * Raised when the CSV, the mapping, or the requested rows cannot be used.
 */
export class SurveyInputError extends Error {
  constructor(message: string, public readonly details: string[] = []) {
    super(details.length > 0 ? `${message}: ${details.join(', ')}` : message);
    this.name = 'SurveyInputError';
  }
}
