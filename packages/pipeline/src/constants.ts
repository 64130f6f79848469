import path, { dirname } from "node:path";
import { fileURLToPath } from "node:url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const repoRoot = path.resolve(__dirname, "../../..");
export const dataRoot = path.join(repoRoot, "data");

export const WIKTEXTRACT_URL = "https://kaikki.org/dictionary/raw-wiktextract-data.jsonl.gz";

export const RAW_DIR = "raw";
export const INTERIM_DIR = "interim";
export const PROCESSED_DIR = "processed";

export const COMPRESSED_WIKTEXTRACT_FILE = "wiktextract.jsonl.gz";
export const WIKTEXTRACT_FILE = "wiktextract.jsonl";
export const MAPPINGS_FILE = "mappings.jsonl";
export const SEED_FILE = "seed.jsonl";
export const ASSOCIATED_FILE = "associated.jsonl";

export const YEAR_PATTERN = /\b(1[0-9]{3}|20[0-9]{2})\b/;

export const DEFAULT_YEAR_SPAN = 25;
export const DEFAULT_THRESHOLD = 0.75;
export const DEFAULT_GAP = 0.1;
export const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-large";
export const DEFAULT_LANGUAGES = ["en", "english"];
export const DEFAULT_BUFFER_SIZE = 1024 * 1024;
export const DEFAULT_TIMEOUT_MS = 60_000;
export const DEFAULT_RETRIES = 4;
export const DEFAULT_RETRY_BASE_DELAY_MS = 750;
export const USER_AGENT = "sensemap-pipeline/0.1 (+local dev)";

export const PROGRESS_INTERVAL = 100_000;
