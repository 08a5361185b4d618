import { writeTextAtomic } from "../artifacts/io.js";
import { formatReceiptText } from "./receipt-text.js";
import { renderReceiptInk } from "./receipt-ink.js";
import { buildReceiptModel, type ReceiptModel } from "./receipt-model.js";

export type ReceiptOutput = {
  model: ReceiptModel;
  text: string;
};

/** Writes `receipt.txt` and shows the receipt on stdout, with ink when stdout is a TTY. */
export const emitReceipt = async (
  runDir: string,
  receiptPath: string,
  options: { quiet?: boolean; tty?: boolean } = {}
): Promise<ReceiptOutput> => {
  const model = buildReceiptModel(runDir);
  const text = formatReceiptText(model);
  writeTextAtomic(receiptPath, text);
  if (!options.quiet) {
    if (options.tty ?? Boolean(process.stdout.isTTY)) {
      await renderReceiptInk(model);
    } else {
      process.stdout.write(text);
    }
  }
  return { model, text };
};
