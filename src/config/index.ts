import { loadSmtpConfig } from "./smtp.js";

export const config = loadSmtpConfig();

export { loadSharedConfig, type SharedConfig } from "./shared.js";
export { loadSmtpConfig, type SmtpConfig } from "./smtp.js";
export { loadApiConfig, type ApiConfig } from "./api.js";
