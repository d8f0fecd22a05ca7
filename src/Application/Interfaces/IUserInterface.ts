/**
 * Contract for operator interaction: pauses, prompts, plans and summary tables.
 */

export interface IUserInterface {
  askQuestion(question: string): Promise<string>;
  showMessage(message: string): Promise<void>;
  showLines(lines: string[]): Promise<void>;
  showTable(data: Record<string, string | number>): Promise<void>;
  close(): Promise<void>;
}
