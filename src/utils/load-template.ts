import Handlebars from "handlebars";
import { readFile } from "fs/promises";
import { dirname, join } from "path";
import { fileURLToPath } from "url";

const templatesDir = join(dirname(fileURLToPath(import.meta.url)), "..", "templates");

/**
 * Load and compile a template from file path or use the bundled one
 * Throws error if custom template fails to load
 */
export async function loadTemplate<T = unknown>(
  templatePath: string | null,
  bundledName = "slide.html.hbs",
): Promise<HandlebarsTemplateDelegate<T>> {
  const file = templatePath ?? join(templatesDir, bundledName);
  const content = await readFile(file, "utf-8");
  return Handlebars.compile<T>(content);
}
