// Delay and sound countdowns. Both saturate at 0 and are decremented by tick()
// at 60 Hz, independent of how many instructions ran in between.
export class Timers {
  private delayValue = 0;
  private soundValue = 0;

  reset(): void {
    this.delayValue = 0;
    this.soundValue = 0;
  }

  get delay(): number { return this.delayValue; }
  set delay(v: number) { this.delayValue = v & 0xff; }

  get sound(): number { return this.soundValue; }
  set sound(v: number) { this.soundValue = v & 0xff; }

  tick(): void {
    if (this.delayValue > 0) this.delayValue--;
    if (this.soundValue > 0) this.soundValue--;
  }

  isSoundActive(): boolean {
    return this.soundValue > 0;
  }
}
