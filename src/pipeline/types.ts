/** Placeholder written wherever a field could not be extracted. */
export const UNKNOWN = "unknown"

/** `display_name` of a row whose page could not be fetched. */
export const ERROR_MARKER = "ERROR"

export const PROFILE_FIELDS = ["display_name", "headline", "location", "summary"] as const

export type ProfileField = (typeof PROFILE_FIELDS)[number]

export type ProfileFields = Readonly<Record<ProfileField, string>>

export interface ProfileRecord extends ProfileFields {
  /** Target URL the row was produced from. */
  readonly address: string
}

/** Column order of the persisted result file. */
export const RESULT_COLUMNS = ["address", ...PROFILE_FIELDS] as const

export type ResultTable = readonly ProfileRecord[]

export interface RunSummary {
  attempted: number
  succeeded: number
  failed: number
}

export type VerboseLog = (scope: string, message: string) => void
