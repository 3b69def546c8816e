/**
 * Admits one holder at a time. Acquisition is synchronous, so a caller that
 * checks the gate before its first `await` cannot race another caller.
 */
export class SingleFlightGate {
  private held = false;

  get isBusy(): boolean {
    return this.held;
  }

  /**
   * @returns true when the gate was free and is now held by the caller
   */
  tryAcquire(): boolean {
    if (this.held) return false;
    this.held = true;
    return true;
  }

  release(): void {
    this.held = false;
  }
}

/**
 * Gate shared by every executor in the process unless one is injected
 */
export const processFilterGate = new SingleFlightGate();
