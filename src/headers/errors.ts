/**
 * Thrown when a component claims a response header that another
 * component already owns for the current response.
 */
export class HeaderClaimConflictError extends Error {
  public readonly headerName: string;

  constructor(headerName: string) {
    super(`Header ${headerName} is already claimed`);
    this.name = "HeaderClaimConflictError";
    this.headerName = headerName;
  }
}
