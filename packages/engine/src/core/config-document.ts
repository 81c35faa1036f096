import { z } from "zod"
import type { ConfigBuilder, ConfigDraft, DataSource } from "../ports/config-builder"
import { MalformedSnapshotError } from "./errors"

const DataSourceEntry = z.looseObject({
  DSRC_ID: z.number().int().positive(),
  DSRC_CODE: z.string().min(1),
})

/** Keys other than the data-source list pass through untouched. */
const SnapshotDocument = z.looseObject({
  CONFIG: z.looseObject({
    VERSION: z.union([z.number(), z.string()]).optional(),
    DATA_SOURCES: z.array(DataSourceEntry),
  }),
})

type SnapshotDocument = z.infer<typeof SnapshotDocument>
type DataSourceEntry = z.infer<typeof DataSourceEntry>

export const SNAPSHOT_VERSION = 1

class DocumentDraft implements ConfigDraft {
  constructor(private readonly doc: SnapshotDocument) {}

  listDataSources(): string[] {
    return this.entries().map((e) => e.DSRC_CODE)
  }

  hasDataSource(code: string): boolean {
    return this.entries().some((e) => e.DSRC_CODE === code)
  }

  addDataSource(code: string): DataSource {
    const existing = this.entries().find((e) => e.DSRC_CODE === code)
    if (existing) return { id: existing.DSRC_ID, code }

    const id = this.entries().reduce((max, e) => Math.max(max, e.DSRC_ID), 0) + 1
    this.entries().push({ DSRC_ID: id, DSRC_CODE: code })

    return { id, code }
  }

  serialize(): string {
    return JSON.stringify(this.doc)
  }

  private entries(): DataSourceEntry[] {
    return this.doc.CONFIG.DATA_SOURCES
  }
}

/** Builds drafts over the `{ CONFIG: { DATA_SOURCES } }` snapshot document. */
export class DocumentConfigBuilder implements ConfigBuilder {
  create(): ConfigDraft {
    return new DocumentDraft({ CONFIG: { VERSION: SNAPSHOT_VERSION, DATA_SOURCES: [] } })
  }

  load(document: string): ConfigDraft {
    let json: unknown

    try {
      json = JSON.parse(document)
    } catch (err) {
      throw MalformedSnapshotError.fromIssues("not JSON", err)
    }

    const parsed = SnapshotDocument.safeParse(json)

    if (!parsed.success) {
      throw MalformedSnapshotError.fromIssues(z.prettifyError(parsed.error))
    }

    return new DocumentDraft(parsed.data)
  }
}
