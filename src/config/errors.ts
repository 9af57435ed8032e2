/**
 * Invalid options, or a capability that was not compiled into this build
 * (such as a standard font without bundled metrics).
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigurationError";
  }
}
