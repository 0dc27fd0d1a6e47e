import { SYSTEM_TEMPLATE_OWNER, type MappingTemplate, type MappingTemplateStore } from "@/lib/templates/types";

/**
 * Process-local template store. Reads return copies.
 */
export class InMemoryMappingTemplateStore implements MappingTemplateStore {
  private readonly templates: MappingTemplate[] = [];

  private visible(owner: string, id: string): MappingTemplate | undefined {
    return this.templates.find(
      (template) => template.id === id && (template.owner === owner || template.owner === SYSTEM_TEMPLATE_OWNER)
    );
  }

  async create(template: MappingTemplate): Promise<void> {
    if (this.templates.some((t) => t.owner === template.owner && t.id === template.id)) {
      throw new Error(`Mapping template already exists: ${template.id}`);
    }
    this.templates.push(structuredClone(template));
  }

  async listForOwner(owner: string): Promise<MappingTemplate[]> {
    return this.templates
      .filter((template) => template.owner === owner || template.owner === SYSTEM_TEMPLATE_OWNER)
      .map((template) => structuredClone(template))
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  async get(owner: string, id: string): Promise<MappingTemplate | null> {
    const template = this.visible(owner, id);
    return template ? structuredClone(template) : null;
  }

  async recordUse(owner: string, id: string, at: string): Promise<void> {
    const template = this.visible(owner, id);
    if (!template) return;
    template.timesUsed++;
    template.lastUsedAt = at;
    template.updatedAt = at;
  }

  async delete(owner: string, id: string): Promise<boolean> {
    const index = this.templates.findIndex((template) => template.owner === owner && template.id === id);
    if (index < 0) return false;
    this.templates.splice(index, 1);
    return true;
  }
}
