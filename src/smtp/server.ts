import { SMTPServer, type SMTPServerOptions } from "smtp-server";
import { config } from "../config/index.js";
import { logger } from "../config/logger.js";
import { deliverMessage } from "../delivery/index.js";
import { mailboxRegistry, type MailboxRegistry } from "../router/index.js";

function smtpError(message: string, responseCode: number): Error {
  return Object.assign(new Error(message), { responseCode });
}

export function createSmtpServer(
  registry: MailboxRegistry = mailboxRegistry
): SMTPServer {
  const options: SMTPServerOptions = {
    authOptional: true,
    disabledCommands: ["STARTTLS", "AUTH"],
    banner: config.smtp.banner,
    size: config.messageSize.maxBytes,
    disableReverseLookup: !config.smtp.reverseLookup,

    onConnect(session, callback) {
      logger.debug({ remoteIp: session.remoteAddress }, "SMTP connection accepted");
      callback();
    },

    onData(stream, session, callback) {
      const chunks: Buffer[] = [];
      let totalSize = 0;
      let sizeLimitExceeded = false;
      const maxSize = config.messageSize.maxBytes;

      stream.on("data", (chunk: Buffer) => {
        if (sizeLimitExceeded) return;
        totalSize += chunk.length;
        if (totalSize > maxSize) {
          sizeLimitExceeded = true;
          const limitMB = (maxSize / (1024 * 1024)).toFixed(1);
          logger.warn({ totalSize, maxSize }, "Message size limit exceeded");
          callback(smtpError(`Message exceeds size limit of ${limitMB} MB`, 552));
          return;
        }
        chunks.push(chunk);
      });
      stream.on("end", () => {
        if (sizeLimitExceeded) return;
        const rawMessage = Buffer.concat(chunks).toString("utf-8");
        const mailFrom = session.envelope.mailFrom
          ? session.envelope.mailFrom.address
          : "unknown";
        const rcptTo = session.envelope.rcptTo.map((r) => r.address);

        // One snapshot per message; a reload mid-delivery does not split the decision.
        const mailboxes = registry.current();

        deliverMessage(
          {
            rawMessage,
            mailFrom,
            rcptTo,
            client: {
              hostname: session.hostNameAppearsAs || undefined,
              ip: session.remoteAddress,
            },
          },
          mailboxes
        )
          .then((result) => {
            if (result.delivered.length === 0) {
              callback(smtpError("No mailbox configured for recipient(s)", 550));
              return;
            }
            callback();
          })
          .catch((err) => {
            logger.error({ error: err }, "Failed to deliver message");
            callback(smtpError("Temporary failure, please try again later", 451));
          });
      });
    },
  };

  return new SMTPServer(options);
}

export function startSmtpServer(server: SMTPServer): Promise<void> {
  return new Promise((resolve, reject) => {
    server.listen(config.smtp.port, config.smtp.host, () => {
      logger.info(
        { host: config.smtp.host, port: config.smtp.port },
        "SMTP server listening"
      );
      resolve();
    });

    server.on("error", (err) => {
      logger.error({ error: err }, "SMTP server error");
      reject(err);
    });
  });
}
