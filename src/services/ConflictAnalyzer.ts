/**
 * Classifies a field selection against source and target reports.
 * Read-only; conflicts are informational and never block a clone by themselves.
 */

import type { AvailableFieldsReport, FieldConflict, SelectionAnalysis } from '../types/models.js';

export class ConflictAnalyzer {
  analyze(
    sourceReport: AvailableFieldsReport,
    targetReport: AvailableFieldsReport,
    fieldKeys: readonly string[]
  ): SelectionAnalysis {
    const validFields: string[] = [];
    const conflicts: FieldConflict[] = [];
    const warnings: string[] = [];

    for (const key of new Set(fieldKeys)) {
      const source = sourceReport.fields.get(key);

      if (!source) {
        warnings.push(`Field ${key} not found in source`);
        continue;
      }

      const { descriptor } = source;

      if (!source.isCloneable) {
        warnings.push(`Field ${descriptor.label} (${key}) is not cloneable`);
        continue;
      }

      validFields.push(key);

      if (targetReport.fields.get(key)?.hasValue === true) {
        conflicts.push({
          fieldKey: key,
          fieldLabel: descriptor.label,
          fieldType: descriptor.type,
        });
      }
    }

    return {
      validFields,
      conflicts,
      warnings,
      hasConflicts: conflicts.length > 0,
      canProceed: validFields.length > 0,
    };
  }
}
