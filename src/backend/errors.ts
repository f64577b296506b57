export class BackendError extends Error {
  constructor(
    message: string,
    public readonly args: readonly string[],
    public readonly stderr: string = ''
  ) {
    super(stderr ? `${message}: ${stderr}` : message);
    this.name = 'BackendError';
  }
}
