import { readFile } from "node:fs/promises";

interface RecordLike {
  [key: string]: unknown;
}

function isRecordLike(value: unknown): value is RecordLike {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isRootEntry(entry: unknown): entry is RecordLike & { metadata: RecordLike } {
  return (
    isRecordLike(entry) &&
    Array.isArray(entry.breadcrumb) &&
    entry.breadcrumb.length === 0 &&
    isRecordLike(entry.metadata)
  );
}

/**
 * Returns the ids of the catalog streams whose root metadata entry has
 * `selected: true`, in file order.
 */
export function parseCatalogSelection(payload: unknown): string[] {
  if (!isRecordLike(payload) || !Array.isArray(payload.streams)) {
    throw new Error("Invalid catalog: expected an object with a streams array");
  }

  const selected: string[] = [];

  payload.streams.forEach((stream: unknown, index: number) => {
    if (!isRecordLike(stream) || typeof stream.tap_stream_id !== "string") {
      throw new Error(`Invalid catalog: streams[${index}] has no tap_stream_id`);
    }

    const metadata = Array.isArray(stream.metadata) ? stream.metadata : [];
    const root = metadata.find(isRootEntry);

    if (root?.metadata.selected === true) {
      selected.push(stream.tap_stream_id);
    }
  });

  return selected;
}

export async function readCatalogSelection(filePath: string): Promise<string[]> {
  const raw = await readFile(filePath, "utf8");
  return parseCatalogSelection(JSON.parse(raw));
}
