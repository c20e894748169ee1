export { generateCommand, type GenerateCommandOptions } from './generate';
export { initCommand, getConfigTemplate, getSchemaTemplate, type InitCommandOptions } from './init';
export { ddlCommand, renderDdl, type DdlCommandOptions } from './ddl';
