/**
 * JSON Schema for the top-level shape of a spec file.
 *
 * A spec file is a YAML sequence whose items are either bare strings
 * (comments) or mappings with exactly one key (features). The grammar of
 * each key and value is checked afterwards by the feature parser.
 */

export const SPEC_DOCUMENT_SCHEMA = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  title: 'packcheck spec document',
  type: 'array',
  minItems: 1,
  items: {
    oneOf: [
      { type: 'string' },
      {
        type: 'object',
        minProperties: 1,
        maxProperties: 1,
      },
    ],
  },
} as const;
