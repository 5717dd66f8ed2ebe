/**
 * Current set-point ladder: nominal first, then one derate step per call to
 * `stepDown`. The bottom step holds. `open()` cuts current entirely.
 */
export class CurrentLimiter {
  private readonly ladder: readonly number[];
  private step = 0;
  private contactorOpen = false;

  constructor(nominalAmp: number, derateStepsAmp: readonly number[]) {
    this.ladder = [nominalAmp, ...derateStepsAmp];
  }

  get currentAmp(): number {
    if (this.contactorOpen) return 0;
    return this.ladder[this.step] ?? 0;
  }

  get derateLevel(): number {
    return this.step;
  }

  stepDown(): number {
    if (this.step < this.ladder.length - 1) this.step++;
    return this.currentAmp;
  }

  open(): void {
    this.contactorOpen = true;
  }
}
