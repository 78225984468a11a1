export { formatZodIssues, type ZodIssueLike } from "./format-zod-issues";
export {
  importZoneSet,
  ZONE_FILE_EXTENSION,
  type ZoneSet,
  type FileImportResult,
} from "./file-importer";
