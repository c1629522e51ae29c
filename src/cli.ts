import { relative, resolve } from "path";
import { parseArgs } from "util";
import { runChecks } from "./check";
import { countErrors } from "./check/diagnostic";
import { loadSiteConfig, sitePath, type SiteConfig } from "./config";
import { buildSite } from "./renderers/site";
import { createPost } from "./scaffold";
import { startDevServer } from "./server";
import { formatCheckSummary, formatDiagnostic, formatError } from "./warn";

export const USAGE = `Usage:
  blogsmith build [--minify] [--baseURL url] [--drafts] [--destination dir] [--source dir]
  blogsmith check [--source dir]
  blogsmith serve [--port 1313] [--source dir]
  blogsmith new <path> [--source dir]`;

function parseCli(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      minify: { type: "boolean" },
      baseURL: { type: "string", short: "b" },
      drafts: { type: "boolean", short: "D" },
      destination: { type: "string", short: "d" },
      source: { type: "string", short: "s" },
      port: { type: "string", short: "p", default: "1313" },
      help: { type: "boolean", short: "h" },
    },
    allowPositionals: true,
  });
}

export async function main(argv: string[]): Promise<number> {
  let parsed: ReturnType<typeof parseCli>;
  try {
    parsed = parseCli(argv);
  } catch (err) {
    console.error(formatError(err));
    console.error(USAGE);
    return 1;
  }

  const { values, positionals } = parsed;
  const [command, target] = positionals;

  if (values.help || !command) {
    console.log(USAGE);
    return values.help ? 0 : 1;
  }

  const rootDir = resolve(values.source ?? process.cwd());
  // CLI args override config values
  const overrides: SiteConfig = {
    minify: values.minify,
    baseURL: values.baseURL,
    buildDrafts: values.drafts,
    publishDir: values.destination,
  };

  try {
    switch (command) {
      case "build": {
        const config = await loadSiteConfig(rootDir, overrides);
        const result = await buildSite(config);
        console.log(
          `Built ${result.posts.length} post(s), ${result.files.length} file(s) into ${relative(process.cwd(), result.outputDir) || "."}`
        );
        if (config.domain) {
          console.log(`CNAME: ${config.domain}`);
        }
        return 0;
      }

      case "check": {
        const config = await loadSiteConfig(rootDir, overrides);
        const { diagnostics, documents } = await runChecks(config);
        for (const diagnostic of diagnostics) {
          const line = formatDiagnostic(diagnostic);
          if (diagnostic.severity === "error") console.error(line);
          else console.warn(line);
        }
        console.log(formatCheckSummary(diagnostics, documents));
        return countErrors(diagnostics) > 0 ? 1 : 0;
      }

      case "serve": {
        const port = Number.parseInt(values.port, 10);
        if (!Number.isInteger(port) || port < 0 || port > 65535) {
          console.error(formatError(`Invalid port: ${values.port}`));
          return 1;
        }
        const dev = await startDevServer({ rootDir, port, overrides });
        process.once("SIGINT", () => {
          dev.close().then(
            () => process.exit(0),
            (err: unknown) => {
              console.error(formatError(err));
              process.exit(1);
            }
          );
        });
        return 0;
      }

      case "new": {
        if (!target) {
          console.error(formatError("new needs a path, e.g. blogsmith new posts/my-post.md"));
          return 1;
        }
        const config = await loadSiteConfig(rootDir, overrides);
        const created = await createPost(sitePath(config, "contentDir"), target);
        console.log(`Created ${relative(process.cwd(), created)}`);
        return 0;
      }

      default:
        console.error(formatError(`Unknown command: ${command}`));
        console.error(USAGE);
        return 1;
    }
  } catch (err) {
    console.error(formatError(err));
    return 1;
  }
}
