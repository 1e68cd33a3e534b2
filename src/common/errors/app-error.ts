/**
 * # App-level error. Should be displayed to users
 *
 * `details` travels to the client as the payload of the failed response.
 */
export abstract class AppError extends Error {
  public abstract readonly code: string;

  constructor(
    message: string,
    private readonly details?: object,
  ) {
    super(message);
  }

  // eslint-disable-next-line class-methods-use-this
  public shouldBeLogged(): boolean {
    return false;
  }

  public devMessage(): string {
    return this.message;
  }

  public payload(): object | undefined {
    return this.details;
  }
}
