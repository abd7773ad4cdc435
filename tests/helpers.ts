import type { Edge } from "../src/contracts";
import { constantSampler, createDisease } from "../src/disease";
import { AdjacencyNetwork } from "../src/network";
import { Population } from "../src/state";

export function network(n: number, edges: Edge[] = []): AdjacencyNetwork {
  return new AdjacencyNetwork(Array.from({ length: n }, (_, i) => i), edges);
}

/** Center 0 joined to 1..leaves. */
export function star(leaves: number): AdjacencyNetwork {
  return network(leaves + 1, Array.from({ length: leaves }, (_, i): Edge => [0, i + 1]));
}

export function path(n: number): AdjacencyNetwork {
  return network(n, Array.from({ length: n - 1 }, (_, i): Edge => [i, i + 1]));
}

export function fixedDisease(contagiousness: number, incubationDays = 7, sicknessDays = 5) {
  return createDisease({
    contagiousness,
    durationIncubation: constantSampler(incubationDays),
    durationSickness: constantSampler(sicknessDays)
  });
}

export function populationWith(net: AdjacencyNetwork, incubating: Record<number, number>, sick: Record<number, number> = {}) {
  const population = new Population(net);
  for (const [id, days] of Object.entries(incubating)) {
    population.susceptible.delete(Number(id));
    population.incubating.set(Number(id), days);
  }
  for (const [id, days] of Object.entries(sick)) {
    population.susceptible.delete(Number(id));
    population.sick.set(Number(id), days);
  }
  return population;
}
