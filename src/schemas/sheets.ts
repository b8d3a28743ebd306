/**
 * zod schemas for the files sheetscope reads about a spreadsheet: OAuth
 * client and token files, and offline spreadsheet fixtures.
 */

import { z } from 'zod';
import type { CellData, RowData } from '../types/index.js';

// ── Cells ───────────────────────────────────────────────────────────────────

const extendedValueSchema = z.object({
  stringValue: z.string().nullable().optional(),
  numberValue: z.number().nullable().optional(),
  boolValue: z.boolean().nullable().optional(),
  formulaValue: z.string().nullable().optional(),
});

export const cellDataSchema: z.ZodType<CellData, z.ZodTypeDef, unknown> =
  z.object({
    userEnteredValue: extendedValueSchema.optional(),
    effectiveValue: extendedValueSchema.optional(),
    formattedValue: z.string().nullable().optional(),
    dataValidation: z
      .object({
        condition: z
          .object({
            type: z.string().nullable().optional(),
            values: z
              .array(
                z.object({
                  userEnteredValue: z.string().nullable().optional(),
                }),
              )
              .optional(),
          })
          .optional(),
      })
      .optional(),
    effectiveFormat: z
      .object({
        numberFormat: z
          .object({
            type: z.string().nullable().optional(),
            pattern: z.string().nullable().optional(),
          })
          .optional(),
      })
      .optional(),
  });

export const rowDataSchema: z.ZodType<RowData, z.ZodTypeDef, unknown> =
  z.object({
    values: z.array(cellDataSchema).optional(),
  });

// ── Fixtures ────────────────────────────────────────────────────────────────

/**
 * An offline spreadsheet: metadata plus full grid data per sheet, in the
 * shape the Sheets API returns with `includeGridData`.
 */
export const spreadsheetFixtureSchema = z.object({
  title: z.string(),
  locale: z.string().optional(),
  timeZone: z.string().optional(),
  sheets: z.array(
    z.object({
      properties: z.object({
        sheetId: z.number(),
        title: z.string(),
        rowCount: z.number().optional(),
        columnCount: z.number().optional(),
        frozenRowCount: z.number().optional(),
        frozenColumnCount: z.number().optional(),
      }),
      rowData: z.array(rowDataSchema),
    }),
  ),
});

export type SpreadsheetFixture = z.infer<typeof spreadsheetFixtureSchema>;

// ── OAuth files ─────────────────────────────────────────────────────────────

const oauthClientSchema = z.object({
  client_id: z.string(),
  client_secret: z.string(),
  redirect_uris: z.array(z.string()).optional(),
});

/** `credentials.json` as downloaded from the Google Cloud console. */
export const credentialsFileSchema = z
  .object({
    installed: oauthClientSchema.optional(),
    web: oauthClientSchema.optional(),
  })
  .refine((file) => file.installed !== undefined || file.web !== undefined, {
    message: 'expected an "installed" or "web" OAuth client',
  });

/** Cached user token (`token.json`). */
export const tokenFileSchema = z.object({
  access_token: z.string().nullable().optional(),
  refresh_token: z.string().nullable().optional(),
  expiry_date: z.number().nullable().optional(),
  token_type: z.string().nullable().optional(),
  id_token: z.string().nullable().optional(),
  scope: z.string().optional(),
});

export type TokenFile = z.infer<typeof tokenFileSchema>;
