import { watch, type FSWatcher } from "fs";
import { readFile, stat } from "fs/promises";
import { createServer, type Server, type ServerResponse } from "http";
import type { AddressInfo } from "net";
import { extname, join, relative, resolve, sep } from "path";
import { CONFIG_FILENAME, loadSiteConfig, sitePath, type ResolvedSiteConfig, type SiteConfig } from "./config";
import { buildSite, resolveTemplateDir } from "./renderers/site";

const RELOAD_PATH = "/__reload";

const HOT_RELOAD_SCRIPT = `
<script>
  const source = new EventSource("${RELOAD_PATH}");
  source.onmessage = (e) => {
    if (e.data === "reload") location.reload();
  };
</script>
`;

const CONTENT_TYPES: Record<string, string> = {
  ".html": "text/html; charset=utf-8",
  ".xml": "application/xml; charset=utf-8",
  ".css": "text/css; charset=utf-8",
  ".js": "text/javascript; charset=utf-8",
  ".json": "application/json; charset=utf-8",
  ".txt": "text/plain; charset=utf-8",
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".svg": "image/svg+xml",
  ".webp": "image/webp",
  ".ico": "image/x-icon",
};

export const DEV_OUTPUT_DIR = ".blogsmith-serve";

export interface DevServerOptions {
  rootDir: string;
  port: number;
  /** CLI flags applied on top of the config file on every reload */
  overrides?: SiteConfig;
}

export interface DevServer {
  server: Server;
  url: string;
  rebuild(): Promise<void>;
  close(): Promise<void>;
}

export function injectReloadScript(html: string): string {
  return html.includes("</body>") ? html.replace("</body>", `${HOT_RELOAD_SCRIPT}</body>`) : html + HOT_RELOAD_SCRIPT;
}

/** Map a request path onto a file in outputDir; null when it escapes the directory */
export function resolveRequestPath(outputDir: string, urlPath: string): string | null {
  let decoded: string;
  try {
    decoded = decodeURIComponent(urlPath.split("?")[0] ?? "/");
  } catch {
    return null;
  }
  const target = resolve(outputDir, `.${decoded.startsWith("/") ? decoded : `/${decoded}`}`);
  const rel = relative(outputDir, target);
  if (rel.startsWith("..") || rel.startsWith(sep)) {
    return null;
  }
  return decoded.endsWith("/") ? join(target, "index.html") : target;
}

async function readServable(path: string): Promise<Buffer | null> {
  const info = await stat(path).catch(() => null);
  if (!info) return null;
  if (info.isDirectory()) {
    return readServable(join(path, "index.html"));
  }
  return readFile(path);
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return typeof address === "object" && address !== null;
}

export async function startDevServer(opts: DevServerOptions): Promise<DevServer> {
  const clients = new Set<ServerResponse>();
  const watchers: FSWatcher[] = [];
  // Served from the root of localhost whatever the production baseURL is.
  const overrides: SiteConfig = { ...opts.overrides, baseURL: "/" };
  let config: ResolvedSiteConfig = await loadSiteConfig(opts.rootDir, overrides);
  let outputDir = resolve(config.rootDir, DEV_OUTPUT_DIR);

  let building: Promise<void> | null = null;
  let pending = false;

  async function runBuild(): Promise<void> {
    config = await loadSiteConfig(opts.rootDir, overrides, { fresh: true });
    const result = await buildSite(config, { includeDrafts: true, outputDir: DEV_OUTPUT_DIR });
    outputDir = result.outputDir;
    console.log(`Rebuilt ${result.posts.length} post(s)`);
    for (const client of clients) {
      client.write("data: reload\n\n");
    }
  }

  // Changes that land mid-build queue exactly one more build.
  function rebuild(): Promise<void> {
    if (building) {
      pending = true;
      return building;
    }
    building = runBuild()
      .catch((err) => {
        console.error("Rebuild error:", err instanceof Error ? err.message : err);
      })
      .finally(() => {
        building = null;
        if (pending) {
          pending = false;
          void rebuild();
        }
      });
    return building;
  }

  async function serveFile(urlPath: string, res: ServerResponse): Promise<void> {
    const path = resolveRequestPath(outputDir, urlPath);
    if (!path) {
      res.writeHead(403, { "Content-Type": "text/plain; charset=utf-8" }).end("Forbidden");
      return;
    }

    const body = await readServable(path);
    if (!body) {
      const notFound = await readServable(join(outputDir, "404.html"));
      res.writeHead(404, { "Content-Type": CONTENT_TYPES[".html"] });
      res.end(notFound ? injectReloadScript(notFound.toString("utf8")) : "Not found");
      return;
    }

    const ext = extname(path) || ".html";
    const type = CONTENT_TYPES[ext] ?? "application/octet-stream";
    res.writeHead(200, { "Content-Type": type });
    res.end(ext === ".html" ? injectReloadScript(body.toString("utf8")) : body);
  }

  await rebuild();

  const server = createServer((req, res) => {
    const urlPath = req.url ?? "/";

    if (urlPath === RELOAD_PATH) {
      res.writeHead(200, {
        "Content-Type": "text/event-stream",
        "Cache-Control": "no-cache",
        Connection: "keep-alive",
      });
      res.write(": connected\n\n");
      clients.add(res);
      req.on("close", () => clients.delete(res));
      return;
    }

    serveFile(urlPath, res).catch((err) => {
      console.error("Request error:", err instanceof Error ? err.message : err);
      if (!res.headersSent) res.writeHead(500);
      res.end();
    });
  });

  await new Promise<void>((resolveListen, rejectListen) => {
    server.once("error", rejectListen);
    server.listen(opts.port, "127.0.0.1", () => resolveListen());
  });

  const watched = [
    sitePath(config, "contentDir"),
    sitePath(config, "staticDir"),
    resolve(await resolveTemplateDir(config), config.template),
  ];
  for (const dir of watched) {
    const exists = await stat(dir).then(
      () => true,
      () => false
    );
    if (!exists) continue;
    watchers.push(
      watch(dir, { recursive: true }, (_event, filename) => {
        console.log("Change detected:", filename ?? dir);
        void rebuild();
      })
    );
  }
  const configPath = resolve(config.rootDir, CONFIG_FILENAME);
  if (await stat(configPath).then(() => true, () => false)) {
    watchers.push(
      watch(configPath, () => {
        console.log("Config change detected, rebuilding...");
        void rebuild();
      })
    );
  }

  const address = server.address();
  const url = `http://127.0.0.1:${isAddressInfo(address) ? address.port : opts.port}/`;
  console.log(`Dev server running at ${url}`);

  return {
    server,
    url,
    rebuild,
    close: async () => {
      while (watchers.length > 0) {
        watchers.pop()?.close();
      }
      for (const client of clients) {
        client.end();
      }
      clients.clear();
      await building;
      await new Promise<void>((resolveClose, rejectClose) =>
        server.close((err) => (err ? rejectClose(err) : resolveClose()))
      );
    },
  };
}
