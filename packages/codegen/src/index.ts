/**
 * @tabula/codegen
 *
 * Schema extraction from TypeScript source, accessor code synthesis and the
 * `tabula` CLI.
 */

export * from './extractor';
export * from './synthesizer';
export * from './generator';
export {
  defineConfig,
  loadConfig,
  validateConfig,
  applyDefaults,
  type TabulaConfig,
  type ResolvedConfig,
  type LoadConfigOptions,
} from './cli/config';
export { renderDdl } from './cli/commands/ddl';
