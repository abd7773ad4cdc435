import type { DayChanges, DiseaseModel, NodeId } from "./contracts";
import { drawDays } from "./disease";
import { InvariantViolation } from "./errors";
import type { RandomSource } from "./rng";
import type { Population } from "./state";

/**
 * Incubating cases contaminate susceptible neighbours and move toward
 * symptoms.
 *
 * Only cases incubating at the start of the day can transmit: contaminations
 * are collected here and applied by `updatePopulation`. Each susceptible
 * neighbour gets at most one successful draw per day.
 */
export function updateIncubations(
  population: Population,
  disease: DiseaseModel,
  rng: RandomSource
): Pick<DayChanges, "newContaminations" | "newSicknesses"> {
  const newContaminations: NodeId[] = [];
  const newSicknesses: NodeId[] = [];
  const marked = new Set<NodeId>();

  for (const [id, daysToSickness] of [...population.incubating]) {
    for (const person of population.network.neighbors(id)) {
      if (!population.susceptible.has(person) || marked.has(person)) continue;
      if (rng.float() < disease.contagiousness) {
        marked.add(person);
        newContaminations.push(person);
      }
    }
    if (daysToSickness === 0) {
      newSicknesses.push(id);
    } else {
      population.incubating.set(id, daysToSickness - 1);
    }
  }
  return { newContaminations, newSicknesses };
}

/** Symptomatic cases move toward recovery. */
export function updateSicknesses(population: Population): NodeId[] {
  const newRecoveries: NodeId[] = [];
  for (const [id, daysToRecovery] of [...population.sick]) {
    if (daysToRecovery === 0) {
      newRecoveries.push(id);
    } else {
      population.sick.set(id, daysToRecovery - 1);
    }
  }
  return newRecoveries;
}

/**
 * Applies one day's transitions.
 *
 * Note the sampler wiring: a case becoming sick gets its sickness length from
 * `durationIncubation`, and a new contamination gets its incubation length
 * from `durationSickness`. Simulation outputs depend on this pairing.
 */
export function updatePopulation(population: Population, disease: DiseaseModel, changes: DayChanges): void {
  for (const id of changes.newSicknesses) {
    if (!population.incubating.delete(id)) {
      throw new InvariantViolation(`new sickness ${id} was not incubating`);
    }
    population.sick.set(id, drawDays(disease.durationIncubation));
  }
  for (const id of changes.newContaminations) {
    if (!population.susceptible.delete(id)) {
      throw new InvariantViolation(`new contamination ${id} was not susceptible`);
    }
    population.incubating.set(id, drawDays(disease.durationSickness));
  }
  for (const id of changes.newRecoveries) {
    if (!population.sick.delete(id)) {
      throw new InvariantViolation(`new recovery ${id} was not sick`);
    }
    population.recovered.add(id);
  }
}

export type SimulateDay = (population: Population, disease: DiseaseModel, rng: RandomSource) => DayChanges;

/** One simulated day: contagion and incubation, sickness, then commit. */
export const simulateDay: SimulateDay = (population, disease, rng) => {
  const { newContaminations, newSicknesses } = updateIncubations(population, disease, rng);
  const newRecoveries = updateSicknesses(population);
  const changes = { newContaminations, newSicknesses, newRecoveries };
  updatePopulation(population, disease, changes);
  return changes;
};
