import { access, readFile } from "fs/promises";
import nunjucks from "nunjucks";
import { resolve } from "path";
import { absUrl, relUrl } from "../urls";
import { formatDate } from "./date";

export async function loadTemplateCss(
  templateDir: string,
  templateName: string,
  stack: string[] = []
): Promise<string> {
  if (stack.includes(templateName)) {
    const chain = [...stack, templateName].join(" -> ");
    throw new Error(`Template CSS inheritance cycle detected: ${chain}`);
  }

  const stylePath = resolve(templateDir, templateName, "style.css");
  const exists = await access(stylePath).then(
    () => true,
    () => false
  );
  if (!exists) {
    if (stack.length > 0) {
      throw new Error(`Template '${templateName}' is missing style.css required by @extends`);
    }
    return "";
  }

  const css = await readFile(stylePath, "utf8");
  const extendsMatch = css.match(/^\/\*\s*@extends\s+([\w-]+)\s*\*\//);

  const parentName = extendsMatch?.[1];
  if (!parentName) {
    return css;
  }
  const parentCss = await loadTemplateCss(templateDir, parentName, [...stack, templateName]);
  const childCss = css.replace(/^\/\*\s*@extends\s+[\w-]+\s*\*\/\n?/, "");
  return `${parentCss}\n${childCss}`;
}

/**
 * Template folders to search, the named one first and then each parent it
 * names through `@extends`, so a child template may override only some files.
 */
export async function resolveTemplateChain(templateDir: string, templateName: string): Promise<string[]> {
  const chain: string[] = [];
  let current: string | undefined = templateName;

  while (current) {
    if (chain.includes(current)) {
      throw new Error(`Template CSS inheritance cycle detected: ${[...chain, current].join(" -> ")}`);
    }
    chain.push(current);
    const css: string = await readFile(resolve(templateDir, current, "style.css"), "utf8").catch(() => "");
    current = css.match(/^\/\*\s*@extends\s+([\w-]+)\s*\*\//)?.[1];
  }

  return chain.map((name) => resolve(templateDir, name));
}

export function createTemplateEnv(searchPaths: string[], baseURL: string): nunjucks.Environment {
  const env = new nunjucks.Environment(new nunjucks.FileSystemLoader(searchPaths, { noCache: true }), {
    autoescape: true,
    throwOnUndefined: false,
  });

  env.addFilter("date", (value: unknown, format = "MMM D, YYYY") => {
    if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
      return "";
    }
    return formatDate(value, String(format));
  });
  env.addFilter("isoDate", (value: unknown) => (value instanceof Date ? value.toISOString() : ""));
  env.addFilter("url", (path: unknown) => relUrl(baseURL, String(path ?? "")));
  env.addFilter("absUrl", (path: unknown) => absUrl(baseURL, String(path ?? "")));

  return env;
}
