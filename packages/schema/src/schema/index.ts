export {
  ZoneRecordSchema,
  ZoneSetSchema,
  parseZoneRecord,
  safeParseZoneRecord,
  parseZoneSet,
  safeParseZoneSet,
  type ParsedZoneRecord,
  type ParsedZoneSet,
} from "./validation";
