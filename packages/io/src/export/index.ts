export { exportZoneSet, type FileExportResult } from "./file-exporter";
