export interface PreviewPrompter {
  intro(message: string): Promise<void>;
  note(message: string, title?: string): Promise<void>;
  /** Resolves `true` once a line is read, `false` if input closes first. */
  waitForLine(): Promise<boolean>;
}
