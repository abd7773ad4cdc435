import type { HealthState, PopulationView } from "./contracts";

const GREY = "#b0b0b0b0";

const NODE_STYLE: Record<HealthState, string | undefined> = {
  susceptible: undefined,
  incubating: 'color="yellow", fillcolor="orange"',
  sick: 'color="orange", fillcolor="red"',
  recovered: 'color="black"'
};

/**
 * Graphviz (neato) source for the population: points on grey edges, coloured
 * by health state. Susceptible nodes keep the default style.
 */
export function toDot(population: PopulationView, size = "7.75,10.25"): string {
  const lines = [
    "graph population {",
    `  graph [layout="neato", size="${size}"];`,
    `  node [shape="point", color="${GREY}"];`,
    `  edge [color="${GREY}"];`
  ];
  for (const id of population.network.nodes()) {
    const state = population.stateOf(id);
    const style = state ? NODE_STYLE[state] : undefined;
    lines.push(style ? `  ${id} [${style}];` : `  ${id};`);
  }
  for (const [a, b] of population.network.edges()) {
    lines.push(`  ${a} -- ${b};`);
  }
  lines.push("}");
  return lines.join("\n") + "\n";
}
