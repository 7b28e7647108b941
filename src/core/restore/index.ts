export { type ArchiveListing, listArchives } from "./catalog";
export { resolveEntryPath, restoreArchive } from "./extractor";
