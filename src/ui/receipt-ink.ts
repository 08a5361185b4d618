import React, { useEffect } from "react";
import { Box, Text, render, useApp } from "ink";

import type { ReceiptModel } from "./receipt-model.js";

const STATUS_COLORS: Record<ReceiptModel["status"], string> = {
  ready: "green",
  budget_exceeded: "yellow",
  failed: "red"
};

const ReceiptView = ({ model }: { model: ReceiptModel }): React.ReactElement => {
  const { exit } = useApp();

  useEffect(() => {
    exit();
  }, [exit]);

  const usage = model.usage
    ? `${model.usage.calls} call(s), in ${model.usage.prompt_tokens}, out ${model.usage.completion_tokens}${
        model.usage.cost !== undefined ? `, $${model.usage.cost.toFixed(4)}` : ""
      }`
    : "-";

  return React.createElement(
    Box,
    { flexDirection: "column" },
    React.createElement(Text, { bold: true }, `Workflow ${model.workflow_id}`),
    React.createElement(Text, { color: STATUS_COLORS[model.status] }, `Status: ${model.status}`),
    React.createElement(
      Text,
      null,
      `Rounds: ${model.rounds} | Correction iterations: ${model.correction_iterations}`
    ),
    React.createElement(Text, null, `Requirement: v${model.requirement_version} ${model.requirement_preview}`),
    React.createElement(Text, null, `Usage: ${usage}`),
    model.error
      ? React.createElement(Text, { color: "red" }, `Error: ${model.error.message}`)
      : null,
    React.createElement(Text, { dimColor: true }, `Output: ${model.run_dir}`)
  );
};

export const renderReceiptInk = async (model: ReceiptModel): Promise<void> => {
  const { waitUntilExit } = render(React.createElement(ReceiptView, { model }));
  await waitUntilExit();
};
