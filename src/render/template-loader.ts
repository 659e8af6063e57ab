import fs from "fs-extra";
import path from "path";
import Handlebars from "handlebars";
import { logger } from "../utils/logger";

export type TemplateSet = Record<string, Handlebars.TemplateDelegate>;

export const DEFAULT_TEMPLATE_DIR = path.resolve(__dirname, "../../templates");

/**
 * Load and compile every `*.hbs` file of a template directory, keyed by file
 * name. A missing directory yields an empty set.
 */
export async function loadTemplates(templateDir: string = DEFAULT_TEMPLATE_DIR): Promise<TemplateSet> {
  const templates: TemplateSet = {};

  Handlebars.registerHelper("upper", (s: unknown) => String(s).toUpperCase());

  if (!(await fs.pathExists(templateDir))) {
    logger.warn("Template directory not found:", templateDir);
    return templates;
  }

  const files = await fs.readdir(templateDir);
  for (const f of files.filter((x) => x.endsWith(".hbs"))) {
    const content = await fs.readFile(path.join(templateDir, f), "utf8");
    // markdown output: no HTML escaping
    templates[f] = Handlebars.compile(content, { noEscape: true });
  }
  return templates;
}
