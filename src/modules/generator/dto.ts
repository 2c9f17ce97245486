import { IsOptional, IsString } from 'class-validator';

/** 必填项在服务层校验，以返回统一的缺失字段提示。 */
export class ModuleGenDto {
  @IsOptional()
  @IsString()
  moduleType?: string;

  @IsOptional()
  @IsString()
  moduleName?: string;

  @IsOptional()
  @IsString()
  frontend?: string;

  @IsOptional()
  @IsString()
  template?: string;

  @IsOptional()
  @IsString()
  outputPath?: string;

  @IsOptional()
  @IsString()
  tableName?: string;

  @IsOptional()
  @IsString()
  description?: string;
}

export interface ModuleInfo {
  moduleType: string;
  moduleName: string;
  frontend: string;
  template: string;
  outputPath: string;
  tableName: string;
  description: string;
}

export interface RouterMetaConfig {
  title: string;
  icon: string;
}

export interface RouterConfig {
  path: string;
  component: string;
  redirect?: string;
  name: string;
  meta: RouterMetaConfig;
  children?: RouterConfig[];
}

export interface StoreConfig {
  moduleName: string;
  state: Record<string, unknown>;
  mutations: Record<string, string>;
  actions: Record<string, string>;
}

export interface ModuleGenResp {
  moduleInfo: ModuleInfo;
  backend: { packageName: string; moduleName: string; files: string[] };
  frontend: {
    framework: string;
    viewsPath: string;
    apiPath: string;
    storePath: string;
    files: string[];
  };
  router: RouterConfig;
  store: StoreConfig;
}

export interface ModuleTemplateResp {
  moduleType: string;
  moduleName: string;
  frontend: string;
  template: string;
  outputPath: string;
  description: string;
}
