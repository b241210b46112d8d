export class SessionTracker {
  private readonly startedAt = Date.now();
  private apiDurationMs = 0;
  private questions = 0;
  private failedQuestions = 0;
  private commandCounts: Record<string, number> = {};

  getWallDurationMs(): number {
    return Date.now() - this.startedAt;
  }

  getApiDurationMs(): number {
    return this.apiDurationMs;
  }

  getQuestionCount(): number {
    return this.questions;
  }

  getCommandCounts(): Record<string, number> {
    return { ...this.commandCounts };
  }

  recordQuestion(durationMs: number, succeeded: boolean): void {
    this.questions += 1;
    this.apiDurationMs += durationMs;
    if (!succeeded) this.failedQuestions += 1;
  }

  recordCommand(name: string): void {
    this.commandCounts[name] = (this.commandCounts[name] || 0) + 1;
  }

  buildSummary(modelName: string): string {
    const formatMs = (ms: number) => (ms / 1000).toFixed(1) + 's';
    const commandSummary = Object.entries(this.commandCounts)
      .map(([name, count]) => `    ${name}: ${count}`)
      .join('\n');

    return [
      'Session summary:',
      `  Total duration (API):  ${formatMs(this.apiDurationMs)}`,
      `  Total duration (wall): ${formatMs(this.getWallDurationMs())}`,
      `  Questions:             ${this.questions} (${this.failedQuestions} failed)`,
      `  Model:                 ${modelName}`,
      commandSummary ? `  Commands:\n${commandSummary}` : '  Commands: none',
    ].join('\n');
  }
}
