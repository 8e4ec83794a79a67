#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { createRequire } from "module";
import { login } from "@/commands/auth/login";
import { logout } from "@/commands/auth/logout";
import { whoami } from "@/commands/auth/whoami";
import { run } from "@/commands/run";
import { serve } from "@/commands/serve";
import { initAppContext } from "@/lib/context";
import { getErrorMessage } from "@/lib/errors";
import { log, ui } from "@/lib/log";

const require = createRequire(import.meta.url);
const packageJson: { version: string } = require("../package.json");

const program = new Command();

program
  .name("gitrelay")
  .description("Device-flow authenticated repository command relay")
  .version(packageJson.version)
  .option("-v, --verbose", "Enable verbose/debug output")
  .addHelpText("beforeAll", ui.banner())
  .configureOutput({
    outputError: (str, write) => write(ui.error(str.trim())),
  })
  .hook("preAction", async (thisCommand) => {
    const opts = thisCommand.opts<{ verbose?: boolean }>();
    if (opts.verbose) {
      log.setVerbose(true);
    }
    await initAppContext();
  })
  .showHelpAfterError();

// =============================================================================
// serve - Run the relay service
// =============================================================================

program
  .command("serve")
  .description("Run the HTTP relay service")
  .option("-H, --host <host>", "Interface to listen on (overrides config)")
  .option("-p, --port <port>", "Port to listen on (overrides config)", parsePort)
  .action(
    handle(async (options: { host?: string; port?: number }) => {
      const running = await serve({
        host: options.host,
        port: options.port,
        version: packageJson.version,
      });

      await new Promise<void>((resolve) => {
        const stop = (signal: NodeJS.Signals) => {
          log.info(`Received ${signal}, shutting down`);
          running.close().then(resolve, (error: unknown) => {
            log.error(`Shutdown failed: ${getErrorMessage(error)}`);
            process.exitCode = 1;
            resolve();
          });
        };
        process.once("SIGINT", stop);
        process.once("SIGTERM", stop);
      });
    })
  );

// =============================================================================
// run - Execute a batch file without a server
// =============================================================================

program
  .command("run")
  .description("Execute a batch of commands against a repository")
  .requiredOption("-f, --file <path>", "JSON file with the command records")
  .requiredOption("-r, --repo <owner/name>", "Target repository")
  .option("-w, --workspace <dir>", "Keep the checkout in this directory")
  .option("--json", "Print the batch report as JSON")
  .action(
    handle(
      async (options: {
        file: string;
        repo: string;
        workspace?: string;
        json?: boolean;
      }) => {
        const spinner = await log.spinner(`Running batch on ${options.repo}...`);

        let result: Awaited<ReturnType<typeof run>>;
        try {
          result = await run({
            file: options.file,
            repo: options.repo,
            workspace: options.workspace,
          });
        } catch (err) {
          spinner.stop();
          throw err;
        }

        if (!result.success) {
          spinner.fail(`${result.error}: ${result.message}`);
          process.exitCode = 1;
          return;
        }

        const { report } = result;
        spinner.stop();

        if (options.json) {
          log.print(JSON.stringify(report, null, 2));
        } else {
          for (const step of report.results) {
            log.print(
              ui.stepResult(step.success, step.step, step.command, step.message)
            );
          }
          log.print("");
          log.print(
            `${report.successfulCommands}/${report.totalCommands} succeeded on ${ui.code(report.repositoryInfo.fullName)}`
          );
        }

        if (report.failedCommands > 0) {
          process.exitCode = 1;
        }
      }
    )
  );

// =============================================================================
// login - Authenticate with the provider
// =============================================================================

program
  .command("login")
  .description("Authenticate with the provider using the device flow")
  .option("--no-browser", "Skip opening browser")
  .option("-f, --force", "Log in again even if a token is stored")
  .action(
    handle(async (options: { browser: boolean; force?: boolean }) => {
      let spinner = await log.spinner("Authenticating...");

      const result = await login({
        noBrowser: options.browser === false,
        force: Boolean(options.force),
        onDeviceCode: (data) => {
          spinner.stop();
          log.print("");
          log.print(
            `${ui.indent()}${ui.muted("Code")}   ${ui.bold(data.userCode)}`
          );
          log.print(
            `${ui.indent()}${ui.muted("URL")}    ${ui.link(data.verificationUri)}`
          );
          log.print("");
        },
        onBrowserOpen: async (opened) => {
          log.print(
            ui.hint(
              opened
                ? `${ui.indent()}Browser opened. Verify the code matches.`
                : `${ui.indent()}Open the URL and enter the code.`
            )
          );
          log.print("");
          spinner = await log.spinner("Waiting for authorization...");
        },
      });

      if (!result.success) {
        spinner.fail(result.error || "Login failed");
        process.exitCode = 1;
        return;
      }

      if (result.alreadyLoggedIn) {
        spinner.stop();
        log.info(
          `Already logged in. Use ${ui.command("gitrelay login --force")} to log in again.`
        );
        return;
      }

      spinner.success("Logged in");
      if (result.user) {
        log.print(
          `${ui.indent()}${result.user.name} ${ui.muted(`@${result.user.login}`)}`
        );
      }
    })
  );

// =============================================================================
// logout - Remove credentials
// =============================================================================

program
  .command("logout")
  .description("Remove stored credentials")
  .option("--all", "Remove credentials for every provider")
  .action(
    handle(async (options: { all?: boolean }) => {
      const result = await logout({ all: Boolean(options.all) });

      if (!result.hadCredentials) {
        log.info("Already logged out");
        return;
      }

      log.success("Logged out");
    })
  );

// =============================================================================
// whoami - Show current user
// =============================================================================

program
  .command("whoami")
  .description("Show the currently authenticated user")
  .action(
    handle(async () => {
      const result = await whoami();

      if (!result.loggedIn) {
        log.info(
          `Not logged in. Run ${ui.command("gitrelay login")} to authenticate.`
        );
        return;
      }

      if (result.user) {
        log.print(ui.keyValue("Name", result.user.name));
        log.print(ui.keyValue("Login", result.user.login));
        if (result.user.email) {
          log.print(ui.keyValue("Email", result.user.email));
        }
      }
      log.print(ui.keyValue("Provider", result.providerUrl));
      if (result.scope) {
        log.print(ui.keyValue("Scope", result.scope));
      }
      if (result.expiresAt) {
        log.print(ui.keyValue("Expires", ui.relativeTime(result.expiresAt)));
      }
    })
  );

// =============================================================================
// Parse and run
// =============================================================================

program
  .parseAsync(process.argv)
  .then(() => {
    // Explicitly exit to avoid hanging on open HTTP connections (e.g., from openid-client)
    process.exit(process.exitCode ?? 0);
  })
  .catch((err: unknown) => {
    log.error(getErrorMessage(err));
    process.exit(1);
  });

// =============================================================================
// Helpers
// =============================================================================

function handle<TArgs extends unknown[]>(
  fn: (...args: TArgs) => Promise<void>
) {
  return async (...args: TArgs) => {
    try {
      await fn(...args);
    } catch (err) {
      log.error(getErrorMessage(err));
      process.exitCode = 1;
    }
  };
}

function parsePort(value: string): number {
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new InvalidArgumentError("Port must be an integer from 0 to 65535.");
  }
  return port;
}
