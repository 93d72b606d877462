import type { AdsRecord, CatalogStream, JsonSchema, SyncState } from "../types";

export interface SchemaMessage {
  type: "SCHEMA";
  stream: string;
  schema: JsonSchema;
  key_properties: string[];
  bookmark_properties?: string[];
}

export interface RecordMessage {
  type: "RECORD";
  stream: string;
  record: AdsRecord;
}

export interface StateMessage {
  type: "STATE";
  value: SyncState;
}

export type OutputMessage = SchemaMessage | RecordMessage | StateMessage;

export interface MessageWriter {
  writeSchema: (stream: CatalogStream) => void;
  writeRecord: (streamId: string, record: AdsRecord) => void;
  writeState: (state: SyncState) => void;
}

function writeToStdout(line: string): void {
  process.stdout.write(`${line}\n`);
}

export function schemaMessageFor(stream: CatalogStream): SchemaMessage {
  const message: SchemaMessage = {
    type: "SCHEMA",
    stream: stream.streamId,
    schema: stream.schema,
    key_properties: stream.keyProperties
  };

  if (stream.kind === "incremental") {
    message.bookmark_properties = [stream.replicationKey];
  }

  return message;
}

/** Writes one JSON message per line. */
export function createMessageWriter(
  write: (line: string) => void = writeToStdout
): MessageWriter {
  const emit = (message: OutputMessage): void => {
    write(JSON.stringify(message));
  };

  return {
    writeSchema(stream: CatalogStream): void {
      emit(schemaMessageFor(stream));
    },
    writeRecord(streamId: string, record: AdsRecord): void {
      emit({ type: "RECORD", stream: streamId, record });
    },
    writeState(state: SyncState): void {
      emit({ type: "STATE", value: state });
    }
  };
}
