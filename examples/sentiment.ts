/**
 * Example: classify product reviews with a signature.
 *
 * Reads OPENAI_API_KEY or OPENROUTER_API_KEY plus the SIGIL_* settings
 * (SIGIL_MODEL, SIGIL_LOG_LEVEL, ...) from the environment, then runs one
 * prediction per review and prints the outputs with their parse diagnostics.
 *
 * Usage:
 *   SIGIL_MODEL=openai/gpt-4o-mini npx tsx examples/sentiment.ts
 */

import {
  Client,
  MemoryCache,
  createConsoleLogger,
  loadSettings,
} from "@sigil/llm-client";
import { Example, FieldKind, Signature, predict } from "@sigil/signatures";

// ---------------------------------------------------------------------------
// Signature
// ---------------------------------------------------------------------------

const signature = new Signature("Classify the sentiment of a product review.")
  .addInput("review", FieldKind.STRING, "customer review text")
  .addClassOutput("sentiment", ["positive", "negative", "neutral"], "overall tone", {
    aliases: { pos: "positive", neg: "negative", mixed: "neutral" },
  })
  .addOutput("confidence", FieldKind.FLOAT, "confidence between 0 and 1");

const examples = [
  new Example(
    { review: "Stopped working after two days and support never answered." },
    { sentiment: "negative", confidence: 0.95 },
  ),
];

const reviews = [
  "Great battery life and the screen is gorgeous.",
  "It does what it says. Nothing more, nothing less.",
  "The strap broke on the first wear.",
];

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const settings = loadSettings();
  const logger = createConsoleLogger(settings.logLevel);

  const client = Client.fromEnv(process.env, {
    retry: { maxRetries: settings.maxRetries },
    timeout: settings.timeout,
    logger,
    defaultProvider: settings.provider,
  });
  if (client.providerNames.length === 0) {
    console.error("Set OPENAI_API_KEY or OPENROUTER_API_KEY to run this example.");
    process.exitCode = 1;
    return;
  }

  const cache = new MemoryCache({ ttl: settings.cacheTTL });
  const model = settings.model ?? "gpt-4o-mini";

  for (const review of reviews) {
    const prediction = await predict({
      signature,
      inputs: { review },
      model,
      client,
      examples,
      cache,
      temperature: 0,
      logger,
    });

    const { adapter, attempts, fallbackUsed, repaired } = prediction.diagnostics;
    console.log(review);
    console.log(`  outputs: ${JSON.stringify(prediction.outputs)}`);
    console.log(
      `  adapter=${adapter} attempts=${attempts} fallback=${fallbackUsed} repaired=${repaired}` +
        ` tokens=${prediction.usage.total_tokens}`,
    );
  }

  await client.close();
}

main().catch((err: unknown) => {
  console.error("Example failed:", err);
  process.exit(1);
});
