/**
 * Base class for every Mini Venmo domain error
 */
export class MiniVenmoError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}
