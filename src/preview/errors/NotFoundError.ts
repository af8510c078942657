export class NotFoundError extends Error {
  constructor(readonly resource: string, message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}
