/**
 * Init command - Scaffold numbered placeholder slides
 */

import chalk from "chalk";
import ora from "ora";
import { relative } from "path";
import { scaffoldSlides } from "../../utils";
import { loadCliConfig, reportFailure } from "../shared";

interface InitOptions {
  input?: string;
  template?: string;
  config?: string;
}

export async function initCommand(
  count: string,
  opts: InitOptions,
): Promise<void> {
  const spinner = ora({ text: "Creating slides...", indent: 2 });

  try {
    const { config } = await loadCliConfig(opts);
    const directory = opts.input ?? config.input.directory;

    spinner.start();
    const result = await scaffoldSlides(directory, {
      count: Number(count),
      width: config.render.width,
      height: config.render.height,
      template: opts.template,
    });

    spinner.succeed(
      `Created ${result.created.length} slide(s) in ${directory}`,
    );
    for (const file of result.skipped) {
      console.log(
        `   ${chalk.yellow("◉")} ${chalk.dim("Skipped existing")} ${relative(process.cwd(), file)}`,
      );
    }
  } catch (error) {
    process.exit(reportFailure(error, spinner, "Could not create slides"));
  }
}
