import type { FieldMapping, ImportFormat } from "@/lib/ingest/types";

/** Owner of templates every owner can see and use */
export const SYSTEM_TEMPLATE_OWNER = "__system__";

/**
 * A saved column-to-field mapping, offered again for files with similar headers
 */
export interface MappingTemplate {
  id: string;
  owner: string;
  name: string;
  description: string | null;
  sourceFormat: ImportFormat;
  /** Header row of the file the template was saved from */
  headers: string[];
  mapping: FieldMapping;
  timesUsed: number;
  lastUsedAt: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface MappingTemplateStore {
  create(template: MappingTemplate): Promise<void>;
  /** The owner's templates plus the system ones, newest first */
  listForOwner(owner: string): Promise<MappingTemplate[]>;
  /** One of the owner's templates or a system template */
  get(owner: string, id: string): Promise<MappingTemplate | null>;
  recordUse(owner: string, id: string, at: string): Promise<void>;
  /** Only the owner's own templates can be deleted */
  delete(owner: string, id: string): Promise<boolean>;
}
