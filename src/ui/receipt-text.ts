import type { ReceiptModel } from "./receipt-model.js";

const formatStatusBanner = (model: ReceiptModel): string => {
  switch (model.status) {
    case "ready":
      return "Done: requirement judged unambiguous";
    case "budget_exceeded":
      return "Done: iteration budget reached, best-effort code generated";
    default:
      return "Stopped: workflow failed";
  }
};

const formatCost = (cost: number | undefined): string =>
  cost === undefined ? "" : `, cost $${cost.toFixed(4)}`;

export const formatReceiptText = (model: ReceiptModel): string => {
  const lines: string[] = [];

  lines.push(formatStatusBanner(model));
  lines.push("");
  lines.push("Summary:");
  lines.push(`- workflow id: ${model.workflow_id}`);
  lines.push(`- status: ${model.status}`);
  lines.push(`- rounds: ${model.rounds}, correction iterations: ${model.correction_iterations}`);
  lines.push(`- requirement: v${model.requirement_version} ${model.requirement_preview}`);
  if (model.usage) {
    lines.push(
      `- usage: ${model.usage.calls} call(s), tokens in ${model.usage.prompt_tokens}, out ${model.usage.completion_tokens}${formatCost(model.usage.cost)}`
    );
  } else {
    lines.push("- usage: not available");
  }
  if (model.error) {
    lines.push(`- error: ${model.error.name} in ${model.error.state}: ${model.error.message}`);
  }

  lines.push("");
  lines.push("Artifacts:");
  if (model.artifacts.length === 0) {
    lines.push("- (no artifacts written)");
  } else {
    for (const artifact of model.artifacts) {
      lines.push(`- ${artifact}`);
    }
  }
  lines.push("");
  lines.push(`Output: ${model.run_dir}`);

  return `${lines.join("\n")}\n`;
};
