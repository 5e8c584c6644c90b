#!/usr/bin/env npx tsx
import { compareFixture, listFixtures, saveExpectation, type Format } from "../test/utils.js";

const [format, name] = process.argv.slice(2);

if ((format !== "vcd" && format !== "saif") || !name) {
  console.error("Usage: npx tsx scripts/gen-golden.ts <vcd|saif> <case-name>");
  process.exit(1);
}

const fixtureFormat: Format = format;
const fixture = (await listFixtures(fixtureFormat)).find((f) => f.name === name);
if (!fixture) {
  console.error(`No fixture test/fixtures/${format}/${name}`);
  process.exit(1);
}

console.log("Comparing:", fixture.actual, "against", fixture.golden);
const result = await compareFixture(fixture);
console.log("Status:", result.status);
if (result.status !== "pass") console.log("Message:", result.message);
await saveExpectation(fixture, result);
console.log("Saved:", `test/fixtures/${format}/${name}/expect.json`);
