// Export format registry

import { z } from 'zod';
import { InputError } from '@albumsmith/shared';

export const exportFormatSchema = z.enum(['json', 'csv', 'txt']);

export type ExportFormat = z.infer<typeof exportFormatSchema>;

export interface ExportFormatInfo {
  label: string;
  extension: string;
  contentType: string;
}

export const EXPORT_FORMATS: Record<ExportFormat, ExportFormatInfo> = {
  json: { label: 'JSON', extension: 'json', contentType: 'application/json; charset=utf-8' },
  csv: { label: 'CSV', extension: 'csv', contentType: 'text/csv; charset=utf-8' },
  txt: { label: 'Text', extension: 'txt', contentType: 'text/plain; charset=utf-8' },
};

/**
 * Validate a user-supplied format name
 */
export function parseExportFormat(value: string | undefined): ExportFormat {
  const parsed = exportFormatSchema.safeParse(value?.toLowerCase());
  if (!parsed.success) {
    throw new InputError(`Unknown export format: ${value ?? '(none)'}`, {
      supported: exportFormatSchema.options,
    });
  }
  return parsed.data;
}
