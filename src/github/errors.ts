export class InvalidRepositoryUrlError extends Error {
  constructor(
    public readonly url: string,
    public readonly reason: string
  ) {
    super(`Invalid repository URL "${url}": ${reason}`);
    this.name = 'InvalidRepositoryUrlError';
  }
}
