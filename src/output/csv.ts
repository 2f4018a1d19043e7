import { mkdir, writeFile } from "node:fs/promises"
import { dirname } from "node:path"

import { createObjectCsvStringifier } from "csv-writer"

import { PersistenceError, getErrorMessage } from "../pipeline/errors.js"
import { RESULT_COLUMNS, type ProfileRecord, type ResultTable } from "../pipeline/types.js"

const csvStringifier = createObjectCsvStringifier({
  header: RESULT_COLUMNS.map((column) => ({ id: column, title: column })),
})

export const renderResultTable = (records: ResultTable): string => {
  const header = csvStringifier.getHeaderString() ?? ""
  if (records.length === 0) {
    return header
  }
  return header + csvStringifier.stringifyRecords(records.map((record) => ({ ...record })))
}

/**
 * Write the whole table to `path` as UTF-8 CSV, replacing any previous file.
 * An empty table still gets its header row.
 */
export const writeResultTable = async (path: string, records: ResultTable): Promise<void> => {
  try {
    await mkdir(dirname(path), { recursive: true })
    await writeFile(path, renderResultTable(records), "utf-8")
  } catch (error) {
    throw new PersistenceError<ProfileRecord>(
      `Could not write results to ${path}: ${getErrorMessage(error)}`,
      path,
      records,
      { cause: error },
    )
  }
}
