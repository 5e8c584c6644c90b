/**
 * hdl-regress MCP Server
 *
 * Model Context Protocol server exposing test listing and regression runs
 * to agents.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { BINARY_NAME, VERSION } from "./version.js";
import { listTests, runTests } from "./service.js";
import type { RunConfigOverrides } from "./config.js";

// =============================================================================
// Server Instructions
// =============================================================================

const SERVER_INSTRUCTIONS = `
# hdl-regress MCP Server

This server runs regression tests for an HDL compiler/simulator toolchain.
Each test is a JSON declaration in a tests directory.

## Workflow Guidance

1. Use \`list_tests\` to see the declared tests, their scenarios and pipelines
2. Use \`run_tests\` with name patterns to run a subset; the report lists every non-passing test
3. Re-run a single failing test with a narrow pattern (e.g. \`^t_trace_abort$\`) after a fix

## Tool Usage Tips

- Scenario labels: dist, vlt, vltmt; aliases vlt_all, linter, simulator
- Outcomes are PASSED, FAILED (stage or assertion failure), SKIPPED, ERRORED (infrastructure)
- \`update_golden=true\` rewrites text goldens from the produced output
- All directory paths should be absolute paths

## Error Handling

Results with an \`error\` field indicate a problem:
- Tests directory missing: check \`tests_dir\` or HDL_REGRESS_TESTS_DIR
- Invalid configuration: the message lists every invalid field
- No tests found: check the name patterns with \`list_tests\`
`.trim();

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Format a result as MCP tool response content.
 */
const formatResult = (
  result: unknown,
): { content: { type: "text"; text: string }[] } => ({
  content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
});

// =============================================================================
// Server Setup
// =============================================================================

/**
 * Create and configure the MCP server.
 */
export const createServer = (): McpServer => {
  const server = new McpServer(
    {
      name: `${BINARY_NAME}-mcp-server`,
      version: VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
      instructions: SERVER_INSTRUCTIONS,
    },
  );

  // -------------------------------------------------------------------------
  // Tool: list_tests
  // -------------------------------------------------------------------------
  server.registerTool(
    "list_tests",
    {
      description: "List the test declarations in a tests directory",
      inputSchema: {
        tests_dir: z
          .string()
          .optional()
          .describe("Absolute path to the tests directory"),
        pattern: z
          .string()
          .optional()
          .describe("Regex pattern to filter test names"),
      },
    },
    async ({ tests_dir, pattern }) => {
      const result = await listTests(tests_dir, pattern);
      return formatResult(result);
    },
  );

  // -------------------------------------------------------------------------
  // Tool: run_tests
  // -------------------------------------------------------------------------
  server.registerTool(
    "run_tests",
    {
      description:
        "Run regression tests and return the report (counts, non-passing tests with diagnostics)",
      inputSchema: {
        tests_dir: z
          .string()
          .optional()
          .describe("Absolute path to the tests directory"),
        patterns: z
          .array(z.string())
          .optional()
          .describe("Regex patterns selecting test names (default: all)"),
        scenarios: z
          .array(z.string())
          .optional()
          .describe("Active scenario labels (e.g. ['vlt_all'])"),
        jobs: z
          .number()
          .int()
          .positive()
          .optional()
          .describe("Number of tests to run concurrently"),
        update_golden: z
          .boolean()
          .optional()
          .default(false)
          .describe("Overwrite text goldens with the produced output"),
        include_outcomes: z
          .boolean()
          .optional()
          .default(false)
          .describe("Include per-stage detail for every test"),
      },
    },
    async ({ tests_dir, patterns, scenarios, jobs, update_golden, include_outcomes }) => {
      const overrides: RunConfigOverrides = {};
      if (scenarios) overrides.scenarios = scenarios;
      if (jobs !== undefined) overrides.workers = jobs;
      if (update_golden) overrides.updateGolden = true;

      const result = await runTests({
        ...(tests_dir ? { testsDir: tests_dir } : {}),
        patterns: patterns ?? [],
        overrides,
      });

      if ("error" in result || include_outcomes) {
        return formatResult(result);
      }
      const { outcomes: _outcomes, ...summary } = result;
      return formatResult(summary);
    },
  );

  return server;
};

/**
 * Run the MCP server with stdio transport.
 */
export const runServer = async (): Promise<void> => {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
};
