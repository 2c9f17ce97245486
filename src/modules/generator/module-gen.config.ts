import config from './module-gen.config.json';

export interface ModuleTypeConfig {
  package: string;
  description: string;
}

export interface FrontendTemplateConfig {
  viewExt: string;
  scriptExt: string;
  description: string;
}

export interface FrontendModuleConfig {
  path: string;
  apiPath: string;
  storePath: string;
}

export interface ModuleGenSettings {
  moduleTypes: Record<string, ModuleTypeConfig>;
  frontendFrameworks: string[];
  frontendTemplates: Record<string, FrontendTemplateConfig>;
  frontendModules: Record<string, FrontendModuleConfig>;
  templates: Record<string, string>;
}

/** 模块类型、前端框架与模板配置。 */
export const moduleGenSettings: ModuleGenSettings = config;
