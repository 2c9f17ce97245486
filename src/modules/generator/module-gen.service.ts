import { Injectable, Logger } from '@nestjs/common';
import { ServiceWarning } from '../../shared/exception/exceptions';
import {
  ModuleGenDto,
  ModuleGenResp,
  ModuleInfo,
  ModuleTemplateResp,
  RouterConfig,
  StoreConfig,
} from './dto';
import { ModuleGenSettings, ModuleTypeConfig, moduleGenSettings } from './module-gen.config';

const REQUIRED_FIELDS = ['moduleType', 'moduleName', 'frontend'] as const;

/** 首字母大写、其余小写。 */
export function capitalize(value: string): string {
  return value ? value.charAt(0).toUpperCase() + value.slice(1).toLowerCase() : value;
}

/**
 * 模块化代码生成：校验模块配置，返回后端文件、前端路径、路由与状态管理配置。
 */
@Injectable()
export class ModuleGenService {
  private readonly logger = new Logger(ModuleGenService.name);

  constructor(private readonly settings: ModuleGenSettings = moduleGenSettings) {}

  validate(dto: ModuleGenDto): ModuleInfo {
    for (const field of REQUIRED_FIELDS) {
      if (!dto[field]?.trim()) {
        throw new ServiceWarning(`缺少必要字段: ${field}`);
      }
    }
    const moduleType = (dto.moduleType ?? '').trim();
    const moduleName = (dto.moduleName ?? '').trim();
    const frontend = (dto.frontend ?? '').trim();
    const type = this.moduleType(moduleType);
    if (!type) {
      throw new ServiceWarning(`不支持的模块类型: ${moduleType}`);
    }
    if (!this.settings.frontendFrameworks.includes(frontend)) {
      throw new ServiceWarning(`不支持的前端框架: ${frontend}`);
    }
    return {
      moduleType,
      moduleName,
      frontend,
      template: dto.template?.trim() || 'crud',
      outputPath: dto.outputPath?.trim() || `modules/${moduleType}/${moduleName}`,
      tableName: dto.tableName?.trim() ?? '',
      description: dto.description?.trim() || type.description,
    };
  }

  generate(dto: ModuleGenDto): ModuleGenResp {
    const info = this.validate(dto);
    this.logger.log(`生成模块化代码: ${info.moduleType}/${info.moduleName}`);
    return {
      moduleInfo: info,
      backend: this.backend(info),
      frontend: this.frontend(info),
      router: this.router(info),
      store: this.store(info),
    };
  }

  supportedModules(): ModuleGenSettings {
    return this.settings;
  }

  template(moduleType: string): ModuleTemplateResp {
    const type = this.moduleType(moduleType);
    if (!type) {
      throw new ServiceWarning(`不支持的模块类型: ${moduleType}`);
    }
    return {
      moduleType,
      moduleName: '',
      frontend: 'vue3',
      template: 'crud',
      outputPath: `modules/${moduleType}`,
      description: type.description,
    };
  }

  private moduleType(name: string): ModuleTypeConfig | undefined {
    return Object.prototype.hasOwnProperty.call(this.settings.moduleTypes, name)
      ? this.settings.moduleTypes[name]
      : undefined;
  }

  private backend(info: ModuleInfo): ModuleGenResp['backend'] {
    const packageName = this.settings.moduleTypes[info.moduleType].package;
    const base = `${info.outputPath}/${info.moduleName}`;
    return {
      packageName,
      moduleName: info.moduleName,
      files: ['controller', 'service', 'dao', 'dto', 'module'].map((layer) => `${base}.${layer}.ts`),
    };
  }

  private frontend(info: ModuleInfo): ModuleGenResp['frontend'] {
    const mod = this.settings.frontendModules[info.moduleType];
    const tpl = this.settings.frontendTemplates[info.frontend];
    const viewsPath = mod?.path ?? `src/views/${info.moduleType}`;
    const apiPath = mod?.apiPath ?? `src/api/${info.moduleType}`;
    const storePath = mod?.storePath ?? `src/store/modules/${info.moduleType}`;
    const viewExt = tpl?.viewExt ?? 'vue';
    const scriptExt = tpl?.scriptExt ?? 'js';
    return {
      framework: info.frontend,
      viewsPath,
      apiPath,
      storePath,
      files: [
        `${viewsPath}/${info.moduleName}/index.${viewExt}`,
        `${apiPath}/${info.moduleName}.${scriptExt}`,
        `${storePath}/${info.moduleName}.${scriptExt}`,
      ],
    };
  }

  private router(info: ModuleInfo): RouterConfig {
    const { moduleType, moduleName } = info;
    return {
      path: `/${moduleType}/${moduleName}`,
      component: 'Layout',
      redirect: 'noredirect',
      name: `${capitalize(moduleType)}${capitalize(moduleName)}`,
      meta: { title: `${moduleName}管理`, icon: 'table' },
      children: [
        {
          path: 'index',
          component: `@/views/${moduleType}/${moduleName}/index`,
          name: `${moduleName}List`,
          meta: { title: `${moduleName}列表`, icon: 'list' },
        },
      ],
    };
  }

  private store(info: ModuleInfo): StoreConfig {
    return {
      moduleName: `${info.moduleType}_${info.moduleName}`,
      state: { loading: false, dataList: [], total: 0, queryParams: {}, form: {} },
      mutations: {
        SET_LOADING: 'setLoading',
        SET_DATA_LIST: 'setDataList',
        SET_TOTAL: 'setTotal',
        SET_QUERY_PARAMS: 'setQueryParams',
        SET_FORM: 'setForm',
      },
      actions: {
        getList: 'getList',
        getDetail: 'getDetail',
        add: 'add',
        update: 'update',
        delete: 'delete',
      },
    };
  }
}
