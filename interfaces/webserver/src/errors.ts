/**
 * Webserver error classes
 */

/**
 * The server refused to start
 */
export class WebserverStartupError extends Error {
  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "WebserverStartupError";
  }
}
