export { createSmtpServer, startSmtpServer } from "./server.js";
