export * from "./aggregate";
export * from "./config";
export * from "./export/exporter";
export * from "./mapping";
export * from "./matching/embedding";
export * from "./matching/matcher";
export * from "./sources/wiktextract/extract";
export * from "./sources/wiktextract/interim";
export * from "./stages/01_fetch";
export * from "./stages/02_extract";
export * from "./stages/03_associate";
export * from "./stages/03_match";
