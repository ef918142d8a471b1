// Host-side tone: a square wave gated by the sound timer. The core only exposes the timer value.
export interface ToneOptions {
  sampleRate: number;
  frequency?: number; // Hz
  amplitude?: number; // 0..1
}

export class SquareWave {
  readonly sampleRate: number;
  readonly frequency: number;
  readonly amplitude: number;
  private phase = 0; // 0..1

  constructor(opts: ToneOptions) {
    this.sampleRate = opts.sampleRate;
    this.frequency = opts.frequency ?? 440;
    this.amplitude = opts.amplitude ?? 0.25;
  }

  // Fill `out` with samples; silence (and phase reset) while the gate is closed
  render(out: Float32Array, gate: boolean): Float32Array {
    if (!gate) {
      out.fill(0);
      this.phase = 0;
      return out;
    }
    const inc = this.frequency / this.sampleRate;
    for (let i = 0; i < out.length; i++) {
      out[i] = this.phase < 0.5 ? this.amplitude : -this.amplitude;
      this.phase += inc;
      if (this.phase >= 1) this.phase -= 1;
    }
    return out;
  }
}
