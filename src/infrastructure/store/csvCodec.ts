import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import { fromRecords, toRecords, type ResultRecord } from "../../core/results/resultRecord";
import type { StoreCodec } from "./FileResultRepository";

export const csvColumns = [
  "identifier",
  "status",
  "error_kind",
  "http_status",
  "error_detail",
  "payload",
  "fetched_at"
] as const;

const csvRowSchema = z.object({
  identifier: z.string(),
  status: z.string(),
  error_kind: z.string(),
  http_status: z.string(),
  error_detail: z.string(),
  payload: z.string(),
  fetched_at: z.string()
});

type CsvRow = z.infer<typeof csvRowSchema>;

const toRow = (record: ResultRecord): CsvRow => ({
  identifier: record.identifier,
  status: record.status,
  error_kind: record.error?.kind ?? "",
  http_status: record.error?.httpStatus != null ? String(record.error.httpStatus) : "",
  error_detail: record.error?.detail ?? "",
  payload: record.payload ? JSON.stringify(record.payload) : "",
  fetched_at: record.fetchedAt
});

// Shape is checked again by fromRecords; this only undoes the flattening.
const fromRow = (row: CsvRow): Record<string, unknown> => {
  if (row.status === "success") {
    return {
      identifier: row.identifier,
      status: row.status,
      payload: JSON.parse(row.payload),
      fetchedAt: row.fetched_at
    };
  }

  const error: Record<string, unknown> = { kind: row.error_kind, detail: row.error_detail };
  if (row.http_status !== "") error.httpStatus = Number(row.http_status);
  return { identifier: row.identifier, status: row.status, error, fetchedAt: row.fetched_at };
};

export const csvStoreCodec: StoreCodec = {
  encode: (store) =>
    stringify(toRecords(store).map(toRow), { header: true, columns: [...csvColumns] }),
  decode: (text) => {
    const rows = z.array(csvRowSchema).parse(parse(text, { columns: true, skip_empty_lines: true }));
    return fromRecords(rows.map(fromRow));
  }
};
