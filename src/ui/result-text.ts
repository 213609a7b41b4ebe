import type { ArbitrationResult } from "../arbitration/types.js";
import type { OrchestrationResult } from "../orchestrator/types.js";
import type { SafetyScore } from "../providers/types.js";
import type { Formatter } from "./fmt.js";

const formatScore = (value: number): string => value.toFixed(3);

const formatSafety = (value: SafetyScore): string =>
  value === "unknown" ? "unknown" : formatScore(value);

export const formatArbitrationText = (result: ArbitrationResult, fmt: Formatter): string => {
  const lines = [
    fmt.header("Arbitration"),
    fmt.kv("Decision", result.decision),
    fmt.kv("Selected", result.selectedCandidate),
    fmt.kv("Divergence", formatScore(result.divergence)),
    fmt.kv("Lexical", formatScore(result.lexicalSimilarity)),
    fmt.kv(
      "model_a",
      `composite ${formatScore(result.scores.model_a.composite)} | coherence ${formatScore(result.scores.model_a.coherence)} | safety ${formatScore(result.scores.model_a.safety)} (${result.scores.model_a.safetyStatus})`
    ),
    fmt.kv(
      "model_b",
      `composite ${formatScore(result.scores.model_b.composite)} | coherence ${formatScore(result.scores.model_b.coherence)} | safety ${formatScore(result.scores.model_b.safety)} (${result.scores.model_b.safetyStatus})`
    )
  ];
  if (result.degraded) {
    lines.push(fmt.warnBlock(`degraded: ${result.degradedReason ?? "embedding unavailable"}`));
  }
  return `${lines.join("\n")}\n`;
};

export const formatOrchestrationText = (result: OrchestrationResult, fmt: Formatter): string => {
  const { provenance } = result;
  const lines = [fmt.header("Stages")];
  provenance.stages.forEach((stage) => {
    lines.push(
      fmt.statusChip(
        `${stage.stage} (${stage.role})`,
        stage.truncated ? "warn" : "success",
        `${stage.chars} chars, safety ${formatSafety(stage.safety)}${stage.truncated ? ", truncated" : ""}`
      )
    );
    lines.push(fmt.muted(`  ${stage.preview.replace(/\s+/g, " ")}`));
  });

  lines.push("");
  lines.push(fmt.header("Arbitration"));
  lines.push(fmt.kv("Decision", provenance.arbitration_decision));
  lines.push(fmt.kv("Selected", `${provenance.selected_candidate} (${provenance.selected_role})`));
  lines.push(fmt.kv("Divergence", formatScore(provenance.divergence)));
  lines.push(fmt.kv("Composite", formatScore(provenance.composite_score)));
  lines.push(
    fmt.kv(
      "Verification",
      provenance.verification_triggered
        ? `triggered (composite < ${provenance.confidence_threshold})`
        : "not needed"
    )
  );
  if (provenance.arbitration_degraded) {
    lines.push(fmt.warnBlock(`arbitration degraded: ${provenance.degraded_reason ?? "unknown cause"}`));
  }

  lines.push("");
  lines.push(fmt.header(`Final answer (${result.finalRole})`));
  lines.push(result.finalOutput);
  return `${lines.join("\n")}\n`;
};
