/**
 * 1-based line counter for diagnostics. Starts below the first line; never
 * consulted for parsing decisions.
 */
export class LocationTracker {
  private index = 0;

  get lineIndex(): number {
    return this.index;
  }

  nextLine(): void {
    this.index += 1;
  }
}
