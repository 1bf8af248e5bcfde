export class InvalidRuleSetError extends Error {
  constructor(
    public readonly location: string,
    public readonly issues: string[],
  ) {
    super(`Invalid rule set in ${location}: ${issues.join('; ')}`);
    this.name = 'InvalidRuleSetError';
  }
}
