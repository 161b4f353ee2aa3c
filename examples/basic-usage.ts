/**
 * Basic token matching with the Matcher API
 *
 * Run with: npm run examples
 */

import { createConsoleSink, findMatches, Matcher, splitCharacters } from "../src";

// ============================================================================
// Example 1: Exact matching of arbitrary tokens
// ============================================================================

function example1_exactTokens(): void {
  console.log("\n=== Example 1: Exact matching ===\n");

  const matcher = new Matcher([3, 1, 4]);
  const results = matcher.findIn([2, 7, 3, 1, 4, 1, 5]);

  // Positions are where the match ends
  console.log("Results:", results);
}

// ============================================================================
// Example 2: Tolerating substitutions with a multiplier
// ============================================================================

function example2_multiplier(): void {
  console.log("\n=== Example 2: nomatchMultiplier 0.5 ===\n");

  const results = findMatches(splitCharacters("kitten"), splitCharacters("the mitten was knitted"), {
    nomatchMultiplier: 0.5,
    threshold: 0.5,
  });

  console.log("Results:", results);
}

// ============================================================================
// Example 3: Watching the matcher work
// ============================================================================

function example3_diagnostics(): void {
  console.log("\n=== Example 3: Diagnostics ===\n");

  const matcher = new Matcher(["to", "be", "or", "not"], {
    allowedDifferences: 1,
    threshold: 0.5,
    diagnostics: createConsoleSink({ prefix: "demo", write: (line) => console.log(line) }),
  });

  matcher.findIn(["to", "be", "or", "nut", "to", "be"]);
}

example1_exactTokens();
example2_multiplier();
example3_diagnostics();
