import type { Extension } from '../extensions/types.js';

/**
 * Append-only collection of findings for one extension in one run
 */
export class ValidationContext {
  private readonly errorList: string[] = [];
  private readonly warningList: string[] = [];

  constructor(readonly extension: Extension) {}

  addError(message: string): void {
    this.errorList.push(message);
  }

  addWarning(message: string): void {
    this.warningList.push(message);
  }

  get errors(): readonly string[] {
    return this.errorList;
  }

  get warnings(): readonly string[] {
    return this.warningList;
  }

  hasErrors(): boolean {
    return this.errorList.length > 0;
  }

  hasWarnings(): boolean {
    return this.warningList.length > 0;
  }
}
