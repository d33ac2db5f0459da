export class InvalidEnvironmentError extends Error {
  constructor(public readonly issues: string) {
    super(`Invalid environment: ${issues}`);
    this.name = 'InvalidEnvironmentError';
  }
}
