// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * basic-gateway.ts
 *
 * Demonstrates the budget-gated gateway workflow:
 *   1. Build a gateway from environment-style configuration.
 *   2. Subscribe to budget warnings.
 *   3. Submit analysis requests and branch on the result.
 *   4. Inspect utilization at the end.
 *
 * Uses the dummy provider, so it runs offline and spends nothing.
 *
 * Run: npx tsx examples/basic-gateway.ts
 */

import {
  BudgetExceededError,
  EVENT_BUDGET_WARNING,
  createGatewayFromEnv,
  estimatePromptTokens,
} from '../src/index.js';

async function main(): Promise<void> {
  // --------------------------------------------------------------------------
  // 1. Configuration normally comes from process.env or loadEnvFile('.env').
  // --------------------------------------------------------------------------
  const gateway = createGatewayFromEnv({
    LINTAI_LLM_PROVIDER: 'dummy',
    LINTAI_MAX_LLM_REQUESTS: '3',
    LINTAI_LOG_LEVEL: 'warn',
  });

  // --------------------------------------------------------------------------
  // 2. Warn once a dimension passes 80% of its limit.
  // --------------------------------------------------------------------------
  gateway.events.on(EVENT_BUDGET_WARNING, (payload) => {
    console.log(
      `  [warning] ${payload.dimension} at ${payload.utilizationPercent.toFixed(0)}% ` +
        `(${payload.used} of ${payload.limit})`,
    );
  });

  // --------------------------------------------------------------------------
  // 3. Submit until the request budget runs out.
  // --------------------------------------------------------------------------
  const files = ['src/index.ts', 'src/config.ts', 'src/gateway.ts', 'src/events.ts'];
  for (const file of files) {
    const prompt = `Review ${file} for unused imports.`;
    const result = await gateway.submit({
      prompt,
      estimatedTokens: estimatePromptTokens(prompt) + 256,
      metadata: { file },
    });

    if (result.ok) {
      console.log(`${file}: ${result.response.text}`);
    } else if (result.error instanceof BudgetExceededError) {
      console.log(`${file}: skipped, ${result.error.message}`);
    } else {
      console.log(`${file}: failed (${result.error.kind}), retryable=${String(result.error.retryable)}`);
    }
  }

  // --------------------------------------------------------------------------
  // 4. Utilization.
  // --------------------------------------------------------------------------
  const { requests } = gateway.utilization();
  console.log(`\nRequests used: ${requests.used} of ${String(requests.limit)}`);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
