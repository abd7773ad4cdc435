import type { ContactNetwork, HealthState, NodeId, PopulationCounts, PopulationView } from "./contracts";
import { InvariantViolation } from "./errors";

/**
 * Mutable health state of every individual of one contact network.
 *
 * Each node id sits in exactly one of the four groups. The step engine and the
 * driver move ids between groups; the network itself may be rewired between
 * days by the intervention policy, so nothing here caches its topology.
 */
export class Population implements PopulationView {
  readonly network: ContactNetwork;
  susceptible = new Set<NodeId>();
  /** id -> days left until symptomatic */
  incubating = new Map<NodeId, number>();
  /** id -> days left until recovery */
  sick = new Map<NodeId, number>();
  recovered = new Set<NodeId>();

  constructor(network: ContactNetwork) {
    this.network = network;
    this.reset();
  }

  /** Everyone back to susceptible. */
  reset() {
    this.susceptible = new Set(this.network.nodes());
    this.incubating = new Map();
    this.sick = new Map();
    this.recovered = new Set();
  }

  counts(): PopulationCounts {
    return {
      susceptible: this.susceptible.size,
      incubating: this.incubating.size,
      sick: this.sick.size,
      recovered: this.recovered.size
    };
  }

  stateOf(id: NodeId): HealthState | undefined {
    if (this.susceptible.has(id)) return "susceptible";
    if (this.incubating.has(id)) return "incubating";
    if (this.sick.has(id)) return "sick";
    if (this.recovered.has(id)) return "recovered";
    return undefined;
  }

  assertPartition() {
    const nodes = this.network.nodes();
    const seen = new Map<NodeId, HealthState>();
    const groups: Array<[HealthState, Iterable<NodeId>]> = [
      ["susceptible", this.susceptible],
      ["incubating", this.incubating.keys()],
      ["sick", this.sick.keys()],
      ["recovered", this.recovered]
    ];
    for (const [state, ids] of groups) {
      for (const id of ids) {
        const prior = seen.get(id);
        if (prior) throw new InvariantViolation(`individual ${id} is both ${prior} and ${state}`);
        if (!this.network.hasNode(id)) throw new InvariantViolation(`${state} individual ${id} is not in the network`);
        seen.set(id, state);
      }
    }
    if (seen.size !== nodes.length) {
      const missing = nodes.filter((id) => !seen.has(id));
      throw new InvariantViolation(`individuals without a health state: ${missing.slice(0, 10).join(", ")}`);
    }
  }
}
