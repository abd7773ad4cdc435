import type { PopulationView, Recorder } from "./contracts";

/** Per-day group sizes, one entry per recorded day. */
export class Monitor implements Recorder {
  readonly day: number[] = [];
  readonly susceptible: number[] = [];
  readonly incubating: number[] = [];
  readonly sick: number[] = [];
  readonly recovered: number[] = [];

  record(day: number, population: PopulationView): void {
    const counts = population.counts();
    this.day.push(day);
    this.susceptible.push(counts.susceptible);
    this.incubating.push(counts.incubating);
    this.sick.push(counts.sick);
    this.recovered.push(counts.recovered);
  }

  get length(): number {
    return this.day.length;
  }

  /** Day with the most sick individuals (first one on ties), or undefined when empty. */
  peakSick(): { day: number; sick: number } | undefined {
    let best: { day: number; sick: number } | undefined;
    for (let i = 0; i < this.sick.length; i++) {
      if (!best || this.sick[i] > best.sick) best = { day: this.day[i], sick: this.sick[i] };
    }
    return best;
  }

  toJSON() {
    return {
      day: this.day,
      susceptible: this.susceptible,
      incubating: this.incubating,
      sick: this.sick,
      recovered: this.recovered
    };
  }
}
