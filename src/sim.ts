import type { DiseaseModel, Edge, Logger, NodeId, Recorder, ScenarioConfig } from "./contracts";
import { createDisease, lognormalSampler } from "./disease";
import { InvariantViolation } from "./errors";
import { cancelConnections, connectionsToCancel, DEFAULT_MIN_CONNECTIONS, restoreConnections } from "./intervention";
import { Monitor } from "./monitor";
import type { AdjacencyNetwork } from "./network";
import { RNG, randomIndex, type RandomSource } from "./rng";
import { Population } from "./state";
import { simulateDay as defaultSimulateDay, type SimulateDay } from "./step";
import { powerlawClusterGraph } from "./topology";

export type IndexCases = Iterable<readonly [NodeId, number]>;

export interface CancelledEventsOptions {
  population: Population;
  disease: DiseaseModel;
  /** Individuals with at least this many contacts get capped. */
  maxSize: number;
  minConnections?: number;
  /** id -> days of incubation left */
  initialCases: IndexCases;
  /** Days simulated before the cap applies. */
  delay?: number;
  ndays?: number;
  rng: RandomSource;
  simulateDay?: SimulateDay;
  logger?: Logger;
  /** Check the four-group partition after every day. */
  checkInvariants?: boolean;
  onIntervention?: (cancelled: readonly Edge[], day: number) => void;
}

function seedIndexCases(population: Population, initialCases: IndexCases) {
  for (const [id, days] of initialCases) {
    if (!population.susceptible.delete(id)) {
      throw new InvariantViolation(`index case ${id} is not a susceptible member of the population`);
    }
    population.incubating.set(id, days);
  }
}

/**
 * Runs `ndays` days with the gathering cap switched on after `delay` days and
 * returns the recorder. Each day is recorded before it is simulated.
 *
 * The cancelled edges are put back when the run ends, including when a day
 * throws.
 */
export function simulateCancelledEvents(opts: CancelledEventsOptions & { recorder?: undefined }): Monitor;
export function simulateCancelledEvents<R extends Recorder>(opts: CancelledEventsOptions & { recorder: R }): R;
export function simulateCancelledEvents(opts: CancelledEventsOptions & { recorder?: Recorder }): Recorder {
  const {
    population,
    disease,
    rng,
    logger,
    delay = 0,
    ndays = 3 * 30,
    minConnections = DEFAULT_MIN_CONNECTIONS,
    simulateDay = defaultSimulateDay
  } = opts;
  const recorder = opts.recorder ?? new Monitor();
  const network = population.network;

  population.reset();
  seedIndexCases(population, opts.initialCases);

  const runDay = (day: number) => {
    recorder.record(day, population);
    simulateDay(population, disease, rng);
    if (opts.checkInvariants) population.assertPartition();
  };

  const switchDay = Math.min(delay, ndays);
  for (let day = 0; day < switchDay; day++) runDay(day);

  const cancelled = connectionsToCancel(network, opts.maxSize, minConnections);
  logger?.(`day ${switchDay}: capping gatherings at ${opts.maxSize}`);
  cancelConnections(network, cancelled, logger);
  opts.onIntervention?.(cancelled, switchDay);

  try {
    for (let day = switchDay; day < ndays; day++) runDay(day);
  } finally {
    restoreConnections(network, cancelled, logger);
  }

  return recorder;
}

export interface ScenarioResult {
  monitor: Monitor;
  population: Population;
  network: AdjacencyNetwork;
  cancelled: readonly Edge[];
}

function pickIndexCases(config: ScenarioConfig, rng: RandomSource): Array<[NodeId, number]> {
  const { ids, count, days } = config.initialCases;
  if (ids) return Object.entries(ids).map<[NodeId, number]>(([id, d]) => [Number(id), d]);
  const chosen = new Set<NodeId>();
  while (chosen.size < count) chosen.add(randomIndex(rng, config.population.size));
  return [...chosen].map<[NodeId, number]>((id) => [id, days]);
}

/** Builds network, disease and index cases from a scenario and runs it. */
export function runScenario(config: ScenarioConfig, options: { logger?: Logger } = {}): ScenarioResult {
  const root = new RNG(config.seed);
  const { size, m, p } = config.population;
  const network = powerlawClusterGraph(size, m, p, root.child("topology"));
  options.logger?.(`network: ${size} individuals, ${network.edgeCount} connections`);

  const { incubation, sickness } = config.disease;
  const disease = createDisease({
    contagiousness: config.disease.contagiousness,
    durationIncubation: lognormalSampler(root.child("incubation"), incubation.mu, incubation.sigma),
    durationSickness: lognormalSampler(root.child("sickness"), sickness.mu, sickness.sigma)
  });

  const population = new Population(network);
  let cancelled: readonly Edge[] = [];
  const monitor = simulateCancelledEvents({
    population,
    disease,
    rng: root.child("contagion"),
    maxSize: config.intervention.maxSize,
    minConnections: config.intervention.minConnections,
    delay: config.intervention.delay,
    ndays: config.ndays,
    initialCases: pickIndexCases(config, root.child("index-cases")),
    logger: options.logger,
    onIntervention: (edges) => {
      cancelled = edges;
    }
  });

  return { monitor, population, network, cancelled };
}
