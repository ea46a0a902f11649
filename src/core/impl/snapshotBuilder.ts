import type { DocId, MessageRecord, RecordInput, Term } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";
import type { BuildOptions, IndexSnapshot, SnapshotBuilder } from "../invertedIndex.js";
import { SnapshotInvariantError } from "../errors.js";
import { MemoryIndexSnapshot, foldIdentifier } from "./memoryIndexSnapshot.js";
import { distinctTerms } from "./simpleTokenizer.js";

/** Text that gets tokenized for a record: the message body plus the author's name. */
export function searchableText(record: MessageRecord): string {
  const author = record.metadata?.author;
  return author ? `${record.text} ${author}` : record.text;
}

function copyRecord(input: RecordInput, id: DocId): MessageRecord {
  const record: MessageRecord = { id, text: input.text };
  if (input.metadata) record.metadata = { ...input.metadata };
  return record;
}

/** `auto-<position>`, suffixed until it differs from every id the upstream sent. */
function generatedId(position: number, taken: ReadonlySet<DocId>): DocId {
  let id = `auto-${position}`;
  for (let n = 1; taken.has(id); n++) id = `auto-${position}-${n}`;
  return id;
}

/**
 * Builds a complete snapshot off to the side.
 *
 * Two passes: dedupe by id first (last write wins, first position kept), then
 * index only the surviving records so no postings entry can point at a
 * replaced version.
 */
export class MemorySnapshotBuilder implements SnapshotBuilder {
  constructor(private readonly tokenizer: Tokenizer) {}

  build(input: Iterable<RecordInput>, options?: BuildOptions): IndexSnapshot {
    const items = Array.from(input);
    const upstreamIds = new Set<DocId>();
    for (const item of items) if (item.id !== undefined) upstreamIds.add(item.id);

    const records = new Map<DocId, MessageRecord>();
    items.forEach((item, position) => {
      const id = item.id ?? generatedId(position, upstreamIds);
      records.set(id, copyRecord(item, id));
    });

    const postings = new Map<Term, DocId[]>();
    const identifiers = new Map<string, DocId[]>();
    const addIdentifier = (value: string, docId: DocId): void => {
      const key = foldIdentifier(value);
      const ids = identifiers.get(key);
      if (!ids) identifiers.set(key, [docId]);
      else if (ids[ids.length - 1] !== docId) ids.push(docId);
    };

    for (const [docId, record] of records) {
      for (const term of distinctTerms(this.tokenizer, searchableText(record))) {
        let ids = postings.get(term);
        if (!ids) {
          ids = [];
          postings.set(term, ids);
        }
        ids.push(docId);
      }

      addIdentifier(docId, docId);
      const authorId = record.metadata?.authorId;
      if (authorId) addIdentifier(authorId, docId);
    }

    assertConsistent(records, postings);

    return new MemoryIndexSnapshot(
      { records, postings, identifiers },
      options?.generation ?? 0,
      options?.builtAt ?? Date.now(),
    );
  }
}

function assertConsistent(records: ReadonlyMap<DocId, MessageRecord>, postings: ReadonlyMap<Term, DocId[]>): void {
  for (const [term, ids] of postings) {
    for (const id of ids) {
      if (!records.has(id)) {
        throw new SnapshotInvariantError(`postings for "${term}" reference unknown record ${id}`);
      }
    }
  }
}
