#!/usr/bin/env node
import { loadSharedConfig } from "./config/shared.js";
import {
  DEFAULT_MAILBOX_NAME,
  MailboxConfigError,
  loadConfiguredMailboxes,
} from "./config/mailboxes.js";
import {
  formatMailboxDetails,
  formatMailboxTable,
  parseArgs,
  routeRecipient,
  validateMailboxes,
} from "./cli/commands.js";
import type { MailboxDefinition } from "./types/index.js";

function printUsage(): void {
  console.log(`
Usage: tsx src/cli.ts <command> [options]

Commands:
  list                          List configured mailboxes in routing order
  show <name>                   Show mailbox details
  validate                      Load the mailbox configuration and report errors
  route <recipient> [options]   Show which mailbox would receive mail for a recipient

Route Options:
  --hostname <name>             Client hostname as announced in HELO/EHLO
  --ip <address>                Client IP address
  --headers <json>              Message headers JSON object

Mailboxes are read from MAILBOXES_FILE (JSON array) and MAILBOXES
(JSON array, or one "Name=Recipients" entry per line). A "${DEFAULT_MAILBOX_NAME}"
catch-all mailbox is appended unless one is configured.

Mailbox Format:
  Sales=*@sales.com, /^support-.*@example\\.com$/
  {"name":"Filtered","recipients":"*@sales.com",
   "headerFilters":[{"header":"X-Application","pattern":"app1"}],
   "sourceFilters":[{"pattern":"*.dev.example.org"}]}
`.trim());
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === "help" || command === "--help") {
    printUsage();
    return;
  }

  const config = loadSharedConfig();

  if (command === "validate") {
    const outcome = await validateMailboxes(config);
    if (outcome.ok) {
      console.log(outcome.line);
    } else {
      console.error(outcome.line);
      process.exitCode = 1;
    }
    return;
  }

  let mailboxes: readonly MailboxDefinition[];
  try {
    mailboxes = await loadConfiguredMailboxes(config);
  } catch (err) {
    if (err instanceof MailboxConfigError) {
      console.error(`Invalid mailbox configuration (${err.code}): ${err.message}`);
      process.exit(1);
    }
    throw err;
  }

  switch (command) {
    case "list":
      console.log(formatMailboxTable(mailboxes).join("\n"));
      break;
    case "show": {
      const name = args[1];
      if (!name) {
        console.error("Usage: show <name>");
        process.exit(1);
      }
      const details = formatMailboxDetails(mailboxes, name);
      if (!details) {
        console.error(`Mailbox "${name}" not found.`);
        process.exit(1);
      }
      console.log(details.join("\n"));
      break;
    }
    case "route": {
      const recipient = args[1];
      if (!recipient || recipient.startsWith("--")) {
        console.error("Usage: route <recipient> [--hostname <name>] [--ip <address>] [--headers <json>]");
        process.exit(1);
      }
      const outcome = routeRecipient(
        mailboxes,
        recipient,
        parseArgs(args.slice(2)),
        config.routing.regexTimeoutMs
      );
      console.log(outcome.line);
      if (!outcome.mailbox) {
        process.exitCode = 2;
      }
      break;
    }
    default:
      console.error(`Unknown command: ${command}`);
      printUsage();
      process.exit(1);
  }
}

main().catch((err) => {
  console.error("CLI error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
