/**
 * Locating a remembered quote in a longer text
 *
 * Run with: npm run examples
 */

import { locateQuote, type MatcherOptions } from "../src";

const text = `
The lighthouse keeper climbed the stairs every evening at dusk. He said the
sea was never the same twice, and that the light mattered most on the nights
nobody came. In the morning he wrote the weather in a small green notebook.

Years later his daughter found the notebook and read the first page aloud:
the sea is never the same twice. She kept it on the kitchen shelf.
`;

const misremembered = "the see was never the same!";

const scenarios: Array<[string, MatcherOptions]> = [
  ["exact words only", {}],
  ["nomatchMultiplier 0.5", { nomatchMultiplier: 0.5, threshold: 0.5 }],
  ["one allowed difference", { allowedDifferences: 1, threshold: 0.5 }],
];

console.log(`Looking for: "${misremembered}"`);

for (const [label, options] of scenarios) {
  console.log(`\n=== ${label} ===`);
  const matches = locateQuote(misremembered, text, options);

  if (matches.length === 0) {
    console.log("  no matches");
  }
  for (const match of matches.slice(0, 5)) {
    console.log(`  ends at word ${match.position} ("${match.word}") score ${match.score.toFixed(3)}`);
  }
}
