// Synthesized playback of chart sonifications through the Web Audio API.
// One sine oscillator per audible planet, shaped by an attack/sustain/decay envelope and panned
// across the stereo field. Only one sound plays at a time; play() stops the previous one.

import type { ChartSonification, PlanetSound } from '../schemas';

// Structural subset of the Web Audio API used here, so tests can supply a fake context.
export interface AudioParamLike {
  value: number;
  setValueAtTime(value: number, time: number): unknown;
  linearRampToValueAtTime(value: number, time: number): unknown;
}
export interface AudioNodeLike { connect(destination: AudioNodeLike): unknown }
export interface OscillatorLike extends AudioNodeLike {
  type: OscillatorType;
  frequency: AudioParamLike;
  start(when?: number): void;
  stop(when?: number): void;
}
export interface GainLike extends AudioNodeLike { gain: AudioParamLike }
export interface PannerLike extends AudioNodeLike { pan: AudioParamLike }
export interface AudioContextLike {
  readonly currentTime: number;
  readonly state: string;
  readonly destination: AudioNodeLike;
  createOscillator(): OscillatorLike;
  createGain(): GainLike;
  createStereoPanner(): PannerLike;
  resume(): Promise<void>;
  close(): Promise<void>;
}

const MIN_INTENSITY = 0.05;
const CHART_GAIN = 0.25;   // keeps the summed voices under clipping
const PLANET_GAIN = 0.3;
const FADE_OUT_S = 0.05;

type Listener = (playing: boolean) => void;

export class AudioEngine {
  private ctx: AudioContextLike | null = null;
  private voices: Array<{ osc: OscillatorLike; gain: GainLike }> = [];
  private playing = false;
  private endTimer: ReturnType<typeof setTimeout> | null = null;
  private readonly listeners = new Set<Listener>();

  constructor(private readonly createContext: () => AudioContextLike = () => new AudioContext()) {}

  get isPlaying(): boolean { return this.playing; }

  /** Subscribe to playback state; returns the unsubscribe function. */
  onPlayingChange(fn: Listener): () => void {
    this.listeners.add(fn);
    return () => { this.listeners.delete(fn); };
  }

  private emit(playing: boolean) {
    this.playing = playing;
    for (const fn of this.listeners) fn(playing);
  }

  private context(): AudioContextLike {
    if (!this.ctx) this.ctx = this.createContext();
    // autoplay policy leaves new contexts suspended until a gesture
    if (this.ctx.state === 'suspended') {
      this.ctx.resume().catch((e: unknown) => console.warn('[audio] resume failed', e));
    }
    return this.ctx;
  }

  private voice(ctx: AudioContextLike, frequency: number, pan: number, volume: number, attack: number, decay: number, duration: number) {
    const now = ctx.currentTime;
    const osc = ctx.createOscillator();
    osc.type = 'sine';
    osc.frequency.value = frequency;
    const gain = ctx.createGain();
    gain.gain.setValueAtTime(0, now);
    gain.gain.linearRampToValueAtTime(volume, now + attack);
    gain.gain.setValueAtTime(volume, now + Math.max(attack, duration - decay));
    gain.gain.linearRampToValueAtTime(0, now + duration);
    const panner = ctx.createStereoPanner();
    panner.pan.value = pan;
    osc.connect(gain);
    gain.connect(panner);
    panner.connect(ctx.destination);
    osc.start(now);
    osc.stop(now + duration);
    this.voices.push({ osc, gain });
  }

  private scheduleEnd(durationS: number) {
    this.endTimer = setTimeout(() => {
      this.endTimer = null;
      this.voices = [];
      if (this.playing) this.emit(false);
    }, Math.round(durationS * 1000));
  }

  play(sonification: ChartSonification) {
    this.stop();
    const ctx = this.context();
    const duration = sonification.totalDuration;
    for (const p of sonification.planets) {
      if (p.intensity < MIN_INTENSITY) continue;
      this.voice(ctx, p.frequency, p.pan, p.intensity * CHART_GAIN, p.attack, p.decay, duration);
    }
    this.emit(true);
    this.scheduleEnd(duration);
  }

  playPlanet(planet: PlanetSound, duration = 3) {
    this.stop();
    const ctx = this.context();
    this.voice(ctx, planet.frequency, planet.pan, planet.intensity * PLANET_GAIN, 0.1, 0.3, duration);
    this.emit(true);
    this.scheduleEnd(duration);
  }

  stop() {
    if (!this.playing) return;
    if (this.endTimer) { clearTimeout(this.endTimer); this.endTimer = null; }
    const ctx = this.ctx;
    if (ctx) {
      const at = ctx.currentTime + FADE_OUT_S;
      // fade to silence, then stop (re-scheduling stop on a started oscillator is allowed)
      for (const v of this.voices) {
        v.gain.gain.linearRampToValueAtTime(0, at);
        v.osc.stop(at + 0.01);
      }
    }
    this.voices = [];
    this.emit(false);
  }

  async dispose() {
    this.stop();
    this.listeners.clear();
    const ctx = this.ctx;
    this.ctx = null;
    if (ctx) await ctx.close();
  }
}
