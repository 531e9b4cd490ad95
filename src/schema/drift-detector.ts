/**
 * Schema drift detection
 */

import type { RemoteFieldDefinition } from "../orm/fields.js";

export type SchemaDriftType = "FIELD_MISSING" | "TYPE_CHANGED" | "FIELD_UNMAPPED";

export interface SchemaDrift {
  type: SchemaDriftType;
  /** Remote field key. */
  field: string;
  /** What the model defines. */
  oldValue: unknown;
  /** What Zendesk has. */
  newValue: unknown;
  severity: "ERROR" | "WARNING";
}

/** The parts of a remote field drift detection compares. */
export interface RemoteFieldSummary {
  key: string;
  type: string;
}

const STANDARD_FIELD_PREFIX = "standard::";

export class DriftDetector {
  /**
   * Compares the fields a model defines with the fields the custom object
   * has in Zendesk.
   */
  detect(local: RemoteFieldDefinition[], remote: RemoteFieldSummary[]): SchemaDrift[] {
    const drifts: SchemaDrift[] = [];
    const remoteByKey = new Map(remote.map((field) => [field.key, field]));
    const localKeys = new Set(local.map((field) => field.key));

    for (const field of local) {
      const remoteField = remoteByKey.get(field.key);
      if (!remoteField) {
        drifts.push({
          type: "FIELD_MISSING",
          field: field.key,
          oldValue: field.type,
          newValue: undefined,
          severity: "ERROR",
        });
      } else if (remoteField.type !== field.type) {
        drifts.push({
          type: "TYPE_CHANGED",
          field: field.key,
          oldValue: field.type,
          newValue: remoteField.type,
          severity: "ERROR",
        });
      }
    }

    // Remote-only fields; standard fields are never part of a model
    for (const field of remote) {
      if (!localKeys.has(field.key) && !field.key.startsWith(STANDARD_FIELD_PREFIX)) {
        drifts.push({
          type: "FIELD_UNMAPPED",
          field: field.key,
          oldValue: undefined,
          newValue: field.type,
          severity: "WARNING",
        });
      }
    }

    return drifts;
  }
}
