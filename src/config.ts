import { access } from "fs/promises";
import { resolve } from "path";
import { pathToFileURL } from "url";

export const THEME_VALUES = ["light", "dark"] as const;
export type Theme = (typeof THEME_VALUES)[number];

export interface SiteConfig {
  /** Site title shown in the header and feed */
  title?: string;
  /** Absolute URL (or root path) the site is published under */
  baseURL?: string;
  /** Custom domain written to CNAME in the publish directory */
  domain?: string;
  languageCode?: string;
  description?: string;
  author?: string;
  /** Template folder name from templates/ */
  template?: string;
  /** Theme: "light" or "dark" */
  theme?: Theme;
  contentDir?: string;
  staticDir?: string;
  /** Images folder inside staticDir that image references must point into */
  imagesDir?: string;
  publishDir?: string;
  /** Sections whose posts are listed on the home page */
  mainSections?: string[];
  /** Posts per list page */
  paginate?: number;
  buildDrafts?: boolean;
  minify?: boolean;
  /** Free-form values available to templates as `params` */
  params?: Record<string, unknown>;
}

export type ResolvedSiteConfig = Required<Omit<SiteConfig, "domain">> & {
  domain?: string;
  /** Site root every relative directory is resolved against */
  rootDir: string;
};

export class ConfigError extends Error {
  override name = "ConfigError";
}

export const CONFIG_FILENAME = "blogsmith.config.ts";

const DEFAULTS: Omit<ResolvedSiteConfig, "rootDir"> = {
  title: "",
  baseURL: "/",
  languageCode: "en",
  description: "",
  author: "",
  template: "default",
  theme: "light",
  contentDir: "content",
  staticDir: "static",
  imagesDir: "images",
  publishDir: "public",
  mainSections: ["posts"],
  paginate: 10,
  buildDrafts: false,
  minify: false,
  params: {},
};

/** Identity helper for type-safe config files */
export function defineConfig(config: SiteConfig): SiteConfig {
  return config;
}

export function isTheme(value: string): value is Theme {
  return THEME_VALUES.some((theme) => theme === value);
}

function isSiteConfig(value: unknown): value is SiteConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Load config from rootDir, returns empty config if the file doesn't exist.
 * Pass `fresh` to bypass the module cache so edits apply during `serve`.
 */
export async function loadConfig(rootDir: string, opts: { fresh?: boolean } = {}): Promise<SiteConfig> {
  const configPath = resolve(rootDir, CONFIG_FILENAME);

  if (!(await fileExists(configPath))) {
    return {};
  }

  let configUrl = pathToFileURL(configPath).href;
  if (opts.fresh) {
    configUrl += `?v=${Date.now()}-${Math.random().toString(36).slice(2)}`;
  }

  let mod: unknown;
  try {
    mod = await import(configUrl);
  } catch (err) {
    throw new ConfigError(`Failed to load ${CONFIG_FILENAME}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const config = isSiteConfig(mod) && "default" in mod ? mod.default : undefined;
  if (config === undefined) {
    return {};
  }
  if (!isSiteConfig(config)) {
    throw new ConfigError(`${CONFIG_FILENAME} must default-export an object`);
  }
  return config;
}

export function normalizeBaseURL(baseURL: string): string {
  const trimmed = baseURL.trim();
  if (trimmed.startsWith("/")) {
    return trimmed.endsWith("/") ? trimmed : `${trimmed}/`;
  }

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    throw new ConfigError(`baseURL must be an absolute http(s) URL or start with "/": ${baseURL}`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ConfigError(`baseURL must use http or https: ${baseURL}`);
  }
  if (!url.pathname.endsWith("/")) {
    url.pathname = `${url.pathname}/`;
  }
  return url.href;
}

/** Defaults, then file config, then CLI overrides (with nested merge for `params`) */
export function resolveSiteConfig(
  rootDir: string,
  fileConfig: SiteConfig,
  overrides: SiteConfig = {}
): ResolvedSiteConfig {
  const merged: ResolvedSiteConfig = {
    ...DEFAULTS,
    ...stripUndefined(fileConfig),
    ...stripUndefined(overrides),
    params: { ...DEFAULTS.params, ...fileConfig.params, ...overrides.params },
    rootDir: resolve(rootDir),
  };

  if (!Number.isInteger(merged.paginate) || merged.paginate < 1) {
    throw new ConfigError(`paginate must be a positive integer, got ${merged.paginate}`);
  }
  if (!isTheme(merged.theme)) {
    throw new ConfigError(`theme must be one of ${THEME_VALUES.join(", ")}`);
  }

  return { ...merged, baseURL: normalizeBaseURL(merged.baseURL) };
}

/** Load root config and apply CLI overrides */
export async function loadSiteConfig(
  rootDir: string,
  overrides: SiteConfig = {},
  opts: { fresh?: boolean } = {}
): Promise<ResolvedSiteConfig> {
  const fileConfig = await loadConfig(rootDir, opts);
  return resolveSiteConfig(rootDir, fileConfig, overrides);
}

export function sitePath(config: ResolvedSiteConfig, key: "contentDir" | "staticDir" | "publishDir"): string {
  return resolve(config.rootDir, config[key]);
}

function stripUndefined(config: SiteConfig): SiteConfig {
  return Object.fromEntries(Object.entries(config).filter(([, value]) => value !== undefined));
}
