/**
 * Bridge commands - Convert a finished PDF to a deck and back
 */

import ora from "ora";
import path from "path";
import * as modules from "../../modules";
import { InputError, fileExists, withExtension } from "../../utils";
import { loadCliConfig, reportFailure } from "../shared";
import type { BridgeResult } from "../../modules";

interface BridgeOptions {
  output?: string;
  config?: string;
  force?: boolean;
  verbose?: boolean;
}

interface PdfToPptxOptions extends BridgeOptions {
  dpi?: string;
}

export async function pdfToPptxCommand(
  input: string,
  opts: PdfToPptxOptions,
): Promise<void> {
  await runBridge(input, ".pptx", opts, (outputPath, { config, logger }) => {
    const dpi = opts.dpi === undefined ? config.bridge.dpi : Number(opts.dpi);
    if (!Number.isFinite(dpi) || dpi <= 0) {
      throw new InputError(
        "invalid-dpi",
        `DPI must be a positive number, got ${opts.dpi}`,
      );
    }
    return modules.pdfToDeck(input, outputPath, { dpi, logger });
  });
}

export async function pptxToPdfCommand(
  input: string,
  opts: BridgeOptions,
): Promise<void> {
  await runBridge(input, ".pdf", opts, (outputPath, { config, logger }) =>
    modules.deckToPdf(input, outputPath, {
      command: config.bridge.converterCommand,
      timeout: config.bridge.converterTimeout,
      width: config.render.width,
      height: config.render.height,
      logger,
    }),
  );
}

type CliConfig = Awaited<ReturnType<typeof loadCliConfig>>;

async function runBridge(
  input: string,
  extension: string,
  opts: BridgeOptions,
  convert: (outputPath: string, cli: CliConfig) => Promise<BridgeResult>,
): Promise<void> {
  const spinner = ora({
    text: `Converting ${path.basename(input)}...`,
    indent: 2,
  });

  try {
    const cli = await loadCliConfig(opts);

    if (!(await fileExists(input))) {
      throw new InputError("no-input", `Input file not found: ${input}`);
    }

    const outputPath = resolveBridgeOutput(input, extension, opts.output);
    if (!opts.force && (await fileExists(outputPath))) {
      throw new InputError(
        "output-exists",
        `Output file already exists: ${outputPath} (use --force to overwrite)`,
      );
    }

    if (cli.config.logging.showProgress) spinner.start();
    const result = await convert(outputPath, cli);
    spinner.succeed(
      `Wrote ${result.pages} page(s) to ${outputPath} (${result.method})`,
    );
  } catch (error) {
    process.exit(reportFailure(error, spinner, "Conversion failed"));
  }
}

/**
 * Output defaults to the input's stem beside it; a missing extension is added
 */
export function resolveBridgeOutput(
  input: string,
  extension: string,
  output?: string,
): string {
  if (output) {
    return path.resolve(withExtension(output, extension));
  }
  const { dir, name } = path.parse(path.resolve(input));
  return path.join(dir, `${name}${extension}`);
}
