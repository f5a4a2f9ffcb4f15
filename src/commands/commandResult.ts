export interface CommandResultOptions {
  showHelp?: boolean;
  exit?: boolean;
}

/**
 * Outcome of a successful command, handed back to the CLI or API for display.
 */
export class CommandResult {
  readonly feedbackToUser: string;
  readonly showHelp: boolean;
  readonly exit: boolean;

  constructor(feedbackToUser: string, options: CommandResultOptions = {}) {
    this.feedbackToUser = feedbackToUser;
    this.showHelp = options.showHelp ?? false;
    this.exit = options.exit ?? false;
    Object.freeze(this);
  }

  equals(other: unknown): boolean {
    return (
      other instanceof CommandResult &&
      other.feedbackToUser === this.feedbackToUser &&
      other.showHelp === this.showHelp &&
      other.exit === this.exit
    );
  }
}
