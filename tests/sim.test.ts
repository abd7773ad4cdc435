import { describe, expect, it } from "vitest";

import { parseScenario, type PopulationView, type Recorder } from "../src/contracts";
import { InvariantViolation } from "../src/errors";
import { RNG } from "../src/rng";
import { runScenario, simulateCancelledEvents } from "../src/sim";
import { Population } from "../src/state";
import { simulateDay } from "../src/step";
import { powerlawClusterGraph } from "../src/topology";
import { fixedDisease, network, star } from "./helpers";

class EdgeCountRecorder implements Recorder {
  readonly edgeCounts: number[] = [];
  readonly indexCounter: Array<number | undefined> = [];

  record(_day: number, population: PopulationView): void {
    this.edgeCounts.push(population.network.edgeCount);
    this.indexCounter.push(population.incubating.get(0));
  }
}

describe("simulateCancelledEvents", () => {
  it("records the entering state of each day", () => {
    const net = network(10, [[0, 1], [1, 2], [2, 3], [3, 4], [4, 5], [5, 6], [6, 7], [7, 8], [8, 9]]);
    const population = new Population(net);
    const monitor = simulateCancelledEvents({
      population,
      disease: fixedDisease(0, 4, 4),
      rng: new RNG(1),
      maxSize: 5,
      initialCases: [[0, 2]],
      delay: 1,
      ndays: 3
    });

    expect(monitor.day).toEqual([0, 1, 2]);
    expect(monitor.susceptible).toEqual([9, 9, 9]);
    expect(monitor.incubating).toEqual([1, 1, 1]);
    expect(monitor.sick).toEqual([0, 0, 0]);
    // the counter hit zero on day 2, so that day's step made the case sick
    expect([...population.sick]).toEqual([[0, 4]]);
    expect(population.incubating.size).toBe(0);
  });

  it("passes every day's snapshot to a custom recorder", () => {
    const population = new Population(network(4));
    const recorder = simulateCancelledEvents({
      population,
      disease: fixedDisease(0),
      rng: new RNG(1),
      maxSize: 5,
      initialCases: new Map([[0, 2]]),
      delay: 1,
      ndays: 3,
      recorder: new EdgeCountRecorder()
    });
    expect(recorder.indexCounter).toEqual([2, 1, 0]);
  });

  it("applies the cap from day zero when there is no delay and restores it afterwards", () => {
    const net = star(8);
    const interventions: Array<[number, number]> = [];
    const recorder = simulateCancelledEvents({
      population: new Population(net),
      disease: fixedDisease(0),
      rng: new RNG(1),
      maxSize: 5,
      minConnections: 3,
      initialCases: [[1, 5]],
      ndays: 4,
      recorder: new EdgeCountRecorder(),
      onIntervention: (edges, day) => interventions.push([edges.length, day])
    });
    expect(recorder.edgeCounts).toEqual([3, 3, 3, 3]);
    expect(interventions).toEqual([[5, 0]]);
    expect(net.edgeCount).toBe(8);
  });

  it("switches the cap on at the delay day", () => {
    const net = star(8);
    const recorder = simulateCancelledEvents({
      population: new Population(net),
      disease: fixedDisease(0),
      rng: new RNG(1),
      maxSize: 5,
      minConnections: 3,
      initialCases: [[1, 5]],
      delay: 2,
      ndays: 4,
      recorder: new EdgeCountRecorder()
    });
    expect(recorder.edgeCounts).toEqual([8, 8, 3, 3]);
    expect(net.edgeCount).toBe(8);
  });

  it("runs no capped days when the delay covers the whole run", () => {
    const net = star(8);
    const logs: string[] = [];
    const recorder = simulateCancelledEvents({
      population: new Population(net),
      disease: fixedDisease(0),
      rng: new RNG(1),
      maxSize: 5,
      minConnections: 3,
      initialCases: [[1, 5]],
      delay: 10,
      ndays: 3,
      recorder: new EdgeCountRecorder(),
      logger: (msg) => logs.push(msg)
    });
    expect(recorder.edgeCounts).toEqual([8, 8, 8]);
    expect(net.edgeCount).toBe(8);
    expect(logs).toEqual([
      "day 3: capping gatherings at 5",
      "cancelled 5 connections (3 remain)",
      "restored 5 connections (8 total)"
    ]);
  });

  it("restores the network when a day throws", () => {
    const net = powerlawClusterGraph(200, 3, 0.2, new RNG(8));
    const before = net.edges();
    let calls = 0;
    expect(() =>
      simulateCancelledEvents({
        population: new Population(net),
        disease: fixedDisease(0.1),
        rng: new RNG(2),
        maxSize: 10,
        initialCases: [[0, 3]],
        delay: 2,
        ndays: 10,
        simulateDay: (population, disease, rng) => {
          if (++calls === 5) throw new Error("boom");
          return simulateDay(population, disease, rng);
        }
      })
    ).toThrow("boom");
    expect(net.edges()).toEqual(before);
  });

  it("rejects index cases outside the population", () => {
    expect(() =>
      simulateCancelledEvents({
        population: new Population(network(3)),
        disease: fixedDisease(0),
        rng: new RNG(1),
        maxSize: 5,
        initialCases: [[7, 1]],
        ndays: 1
      })
    ).toThrow(InvariantViolation);
  });

  it("holds the partition on every day of a stochastic run", () => {
    const net = powerlawClusterGraph(400, 4, 1 / 3, new RNG(21));
    const before = net.edges();
    const monitor = simulateCancelledEvents({
      population: new Population(net),
      disease: fixedDisease(0.15, 3, 4),
      rng: new RNG(22),
      maxSize: 15,
      initialCases: [[0, 1], [1, 2], [2, 3]],
      delay: 10,
      ndays: 40,
      checkInvariants: true
    });
    expect(monitor.length).toBe(40);
    monitor.day.forEach((_, i) => {
      expect(monitor.susceptible[i] + monitor.incubating[i] + monitor.sick[i] + monitor.recovered[i]).toBe(400);
    });
    expect(net.edges()).toEqual(before);
  });
});

describe("runScenario", () => {
  const config = parseScenario({
    seed: 3,
    ndays: 30,
    population: { size: 300, m: 3 },
    disease: { contagiousness: 0.1 },
    intervention: { maxSize: 12, delay: 5 }
  });

  it("is reproducible for a seed", () => {
    const a = runScenario(config);
    const b = runScenario(config);
    expect(a.monitor.toJSON()).toEqual(b.monitor.toJSON());
    expect(a.monitor.length).toBe(30);
    expect(a.monitor.incubating[0]).toBe(3);
    expect(a.cancelled).toEqual(b.cancelled);
    expect(a.cancelled.length).toBeGreaterThan(0);
  });

  it("uses explicit index cases when given", () => {
    const explicit = parseScenario({ ...config, initialCases: { ids: { "4": 1, "9": 0 } } });
    const { monitor, population } = runScenario(explicit);
    expect(monitor.incubating[0]).toBe(2);
    expect(monitor.susceptible[0]).toBe(298);
    expect(population.stateOf(4)).not.toBe("susceptible");
    expect(population.stateOf(9)).not.toBe("susceptible");
  });

  it("leaves the generated network in its original topology", () => {
    const { network: net } = runScenario(config);
    const fresh = powerlawClusterGraph(300, 3, 1 / 3, new RNG(3).child("topology"));
    expect(net.edges()).toEqual(fresh.edges());
  });
});
