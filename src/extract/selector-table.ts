import type { ProfileField } from "../pipeline/types.js"

export interface SelectorTable {
  /** Bumped whenever the site markup forces a selector change. */
  readonly version: string
  readonly fields: Readonly<Record<ProfileField, readonly string[]>>
}

export const DEFAULT_SELECTOR_TABLE: SelectorTable = {
  version: "2025.11",
  fields: {
    display_name: [".text-heading-xlarge", "h1"],
    headline: [".text-body-medium.break-words", ".pv-top-card-section__headline"],
    location: [
      ".text-body-small.inline.t-black--light.break-words",
      ".pv-top-card-section__location",
    ],
    summary: ["section.pv-about-section p", "#about", ".display-flex.ph5.pv3 span"],
  },
}
