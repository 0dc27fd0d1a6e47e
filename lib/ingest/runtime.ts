import { getEnv, getImportConfig, hasGoogleBooks, type ImportConfig } from "@/lib/config/env";
import { PgCatalog, PgOwnerSettings } from "@/lib/catalog/pgCatalog";
import { GoogleBooksProvider } from "@/lib/ingest/googlebooks";
import { UnifiedMetadataProvider } from "@/lib/ingest/metadata";
import { OpenLibraryProvider } from "@/lib/ingest/openlibrary";
import { ImportRunner } from "@/lib/ingest/pipeline";
import { PgJobStore } from "@/lib/jobs/pgStore";
import { PgMappingTemplateStore } from "@/lib/templates/pgStore";
import { logger } from "@/lib/util/logger";

export interface RuntimeOptions {
  enrich?: boolean;
  deleteSourceFiles?: boolean;
  config?: Partial<ImportConfig>;
}

/**
 * Import runner wired to Postgres and the public metadata providers
 */
export function createImportRunner(options: RuntimeOptions = {}): ImportRunner {
  const env = getEnv();
  if (options.enrich !== false && !hasGoogleBooks()) {
    logger.warn("GOOGLE_BOOKS_API_KEY not set, Google Books requests will be anonymous");
  }
  const metadata =
    options.enrich === false
      ? null
      : new UnifiedMetadataProvider(
          new GoogleBooksProvider({ apiKey: env.GOOGLE_BOOKS_API_KEY }),
          new OpenLibraryProvider()
        );

  return new ImportRunner({
    jobStore: new PgJobStore(),
    catalog: new PgCatalog(),
    settings: new PgOwnerSettings(),
    metadata,
    config: getImportConfig(options.config),
    deleteSourceFiles: options.deleteSourceFiles,
    templates: new PgMappingTemplateStore(),
  });
}
