import { Mailbox, type AudioSignal } from '../audio/mailbox';

export interface TimerView {
  readonly delay: number;
  readonly sound: number;
  readonly tickCount: number;
}

// Delay and sound timers: 8-bit counters that count down to 0 once per tick (60 Hz),
// independently of the instruction rate.
export class Timers implements TimerView {
  private delayValue = 0;
  private soundValue = 0;
  private ticks = 0;

  constructor(private readonly audio: Mailbox<AudioSignal>) {}

  reset(): void {
    this.delayValue = 0;
    this.soundValue = 0;
    this.ticks = 0;
  }

  get delay(): number { return this.delayValue; }
  get sound(): number { return this.soundValue; }
  get tickCount(): number { return this.ticks; }

  setDelay(v: number): void { this.delayValue = v & 0xff; }
  setSound(v: number): void { this.soundValue = v & 0xff; }

  /**
   * Advance both timers by one tick.
   * @returns true when the sound timer expired on this tick
   */
  tick(): boolean {
    this.ticks++;
    if (this.delayValue > 0) this.delayValue--;
    if (this.soundValue === 0) return false;
    this.soundValue--;
    if (this.soundValue !== 0) return false;
    this.audio.offer({ tick: this.ticks });
    return true;
  }
}
