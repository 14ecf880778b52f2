import fs from 'fs';

/** Polls for the presence of an operator-controlled file. */
export class KillSwitch {
  private lastState = false;
  private lastChecked = 0;

  constructor(
    private readonly filePath: string | undefined,
    private readonly pollIntervalMs = 1_000,
  ) {}

  isActive(options?: { force?: boolean }): boolean {
    const pathRaw = this.filePath?.trim();
    if (!pathRaw) {
      this.lastState = false;
      return false;
    }
    const now = Date.now();
    if (!options?.force && now - this.lastChecked < this.pollIntervalMs) {
      return this.lastState;
    }
    this.lastChecked = now;
    this.lastState = fs.existsSync(pathRaw);
    return this.lastState;
  }

  path(): string | null {
    const trimmed = this.filePath?.trim();
    return trimmed && trimmed.length > 0 ? trimmed : null;
  }
}
