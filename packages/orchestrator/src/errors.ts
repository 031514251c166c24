/** Thrown when a subagent profile cannot be bound to the parent's tools. */
export class SubagentConfigError extends Error {
  constructor(
    public readonly profile: string,
    message: string,
  ) {
    super(`Subagent profile \`${profile}\`: ${message}`);
    this.name = 'SubagentConfigError';
  }
}
