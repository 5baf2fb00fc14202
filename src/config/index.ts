export { type ClientConfig, EnvSchema, loadConfig } from './config.js';
