import { z } from "zod";

import { ConfigError } from "./errors";

/** ===== Simulation core ===== */
export type NodeId = number;
export type Edge = readonly [NodeId, NodeId];

export type HealthState = "susceptible" | "incubating" | "sick" | "recovered";

/**
 * Undirected contact graph. Topology is fixed for a run except through
 * `removeEdges`/`addEdges`, which the intervention policy calls explicitly.
 */
export interface ContactNetwork {
  nodes(): NodeId[];
  hasNode(id: NodeId): boolean;
  degree(id: NodeId): number;
  /** Neighbours in ascending id order. */
  neighbors(id: NodeId): NodeId[];
  hasEdge(a: NodeId, b: NodeId): boolean;
  edges(): Edge[];
  readonly edgeCount: number;
  removeEdges(pairs: Iterable<Edge>): void;
  addEdges(pairs: Iterable<Edge>): void;
}

export type DurationSampler = () => number;

/**
 * Disease parameters. Probabilities outside [0, 1] and samplers returning
 * negative values are not rejected; results are undefined.
 */
export interface DiseaseModel {
  readonly contagiousness: number;
  readonly durationIncubation: DurationSampler;
  readonly durationSickness: DurationSampler;
}

export interface PopulationCounts {
  susceptible: number;
  incubating: number;
  sick: number;
  recovered: number;
}

export interface PopulationView {
  readonly network: ContactNetwork;
  readonly susceptible: ReadonlySet<NodeId>;
  readonly incubating: ReadonlyMap<NodeId, number>;
  readonly sick: ReadonlyMap<NodeId, number>;
  readonly recovered: ReadonlySet<NodeId>;
  counts(): PopulationCounts;
  stateOf(id: NodeId): HealthState | undefined;
}

export interface Recorder {
  record(day: number, population: PopulationView): void;
}

export interface DayChanges {
  newContaminations: NodeId[];
  newSicknesses: NodeId[];
  newRecoveries: NodeId[];
}

export type Logger = (msg: string) => void;

/** ===== Scenario file ===== */
export const LognormalParams = z.object({
  mu: z.number().default(1.2),
  sigma: z.number().nonnegative().default(0.5)
});
export type LognormalParams = z.infer<typeof LognormalParams>;

export const ScenarioConfig = z.object({
  seed: z.number().int().nonnegative().default(42),
  ndays: z.number().int().nonnegative().default(90),
  population: z.object({
    size: z.number().int().positive().default(1000),
    m: z.number().int().positive().default(5),
    p: z.number().min(0).max(1).default(1 / 3)
  }).default({}),
  disease: z.object({
    contagiousness: z.number().min(0).max(1).default(0.05),
    incubation: LognormalParams.default({}),
    sickness: LognormalParams.default({})
  }).default({}),
  intervention: z.object({
    maxSize: z.number().int().positive().default(20),
    minConnections: z.number().int().nonnegative().default(5),
    delay: z.number().int().nonnegative().default(0)
  }).default({}),
  initialCases: z.object({
    count: z.number().int().positive().default(3),
    days: z.number().int().nonnegative().default(3),
    /** Explicit index cases (id -> incubation days); overrides count/days. */
    ids: z.record(z.string().regex(/^(0|[1-9]\d*)$/, "index case ids must be integers without leading zeros"), z.number().int().nonnegative()).optional()
  }).default({})
}).superRefine((cfg, ctx) => {
  if (cfg.population.m >= cfg.population.size) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["population", "m"], message: "m must be smaller than the population size" });
  }
  const { count, ids } = cfg.initialCases;
  if (!ids && count > cfg.population.size) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["initialCases", "count"], message: "more initial cases than individuals" });
  }
  for (const key of Object.keys(ids ?? {})) {
    if (Number(key) >= cfg.population.size) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["initialCases", "ids", key], message: `no individual ${key} in a population of ${cfg.population.size}` });
    }
  }
});
export type ScenarioConfig = z.infer<typeof ScenarioConfig>;

export function parseScenario(raw: unknown, source = "<inline>"): ScenarioConfig {
  const res = ScenarioConfig.safeParse(raw);
  if (!res.success) {
    throw new ConfigError(source, res.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`));
  }
  return res.data;
}
