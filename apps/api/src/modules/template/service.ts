import type {
  ContractFormSchema,
  ContractTemplateDto,
  ContractTypeDto,
  TemplateFilter,
  TemplateInputs,
  TemplateService,
} from '@quill/shared';
import { NotFoundError, ValidationError } from '../../middleware/error-handler';
import { defaultCatalog } from './catalog';
import type { Catalog, CatalogContractType, CatalogTemplate } from './catalog';

const PLACEHOLDER = /\{\{\s*([A-Za-z0-9_]+)\s*\}\}/g;

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

function isBlank(value: TemplateInputs[string] | undefined): boolean {
  return value === undefined || value === null || String(value).trim() === '';
}

function toDto({ body: _body, ...template }: CatalogTemplate): ContractTemplateDto {
  return template;
}

export class TemplateCatalogService implements TemplateService {
  constructor(private readonly catalog: Catalog = defaultCatalog) {}

  listTemplates(filter: TemplateFilter = {}): ContractTemplateDto[] {
    return this.catalog.templates
      .filter((t) => !filter.category || t.category === filter.category)
      .filter((t) => !filter.jurisdiction || t.jurisdiction === filter.jurisdiction)
      .map(toDto);
  }

  getTemplate(templateId: string): ContractTemplateDto {
    const template = this.catalog.templates.find((t) => t.id === templateId);
    if (!template) throw new NotFoundError('Template', templateId);
    return toDto(template);
  }

  listTypes(): ContractTypeDto[] {
    return this.catalog.types.map(({ schema: _schema, ...type }) => type);
  }

  getTypeSchema(contractType: string): ContractFormSchema {
    return this.findType(contractType).schema;
  }

  render(contractType: string, inputs: TemplateInputs): string {
    const type = this.findType(contractType);
    const template = this.catalog.templates.find((t) => t.contractType === type.id);
    if (!template) throw new NotFoundError('Template', contractType);

    const missing = type.schema.required.filter((name) => isBlank(inputs[name]));
    if (missing.length > 0) {
      throw new ValidationError(`Missing required inputs: ${missing.join(', ')}`, { missing });
    }

    return template.body.replace(PLACEHOLDER, (_match, name: string) => {
      const value = inputs[name];
      return value === undefined || value === null ? '' : escapeHtml(String(value));
    });
  }

  private findType(contractType: string): CatalogContractType {
    const type = this.catalog.types.find((t) => t.id === contractType);
    if (!type) throw new NotFoundError('ContractType', contractType);
    return type;
  }
}
