/**
 * Field groups for the "post" schema used across the service and API tests.
 * Built from stored-style JSON so the descriptor parser is exercised too.
 */

import { parseFieldGroup } from '../../src/fields/descriptors.js';
import type { FieldGroup } from '../../src/types/models.js';

export const POST_GROUPS: FieldGroup[] = [
  parseFieldGroup({
    key: 'group_main',
    title: 'Main',
    fields: [
      { key: 'price', name: 'price', label: 'Price', type: 'number', min: 0, max: 1000 },
      { key: 'gallery', name: 'gallery', label: 'Gallery', type: 'gallery' },
      { key: 'subtitle', name: 'subtitle', label: 'Subtitle', type: 'text', required: true },
      { key: 'contact_email', name: 'contact_email', label: 'Contact Email', type: 'email' },
      { key: 'hero', name: 'hero', label: 'Hero Image', type: 'image' },
      { key: 'featured', name: 'featured', label: 'Featured', type: 'true_false' },
      { key: 'notice', name: 'notice', label: 'Notice', type: 'message' },
    ],
  }),
  parseFieldGroup({
    key: 'group_layout',
    title: 'Layout',
    fields: [
      {
        key: 'slides',
        name: 'slides',
        label: 'Slides',
        type: 'repeater',
        sub_fields: [
          { key: 'slide_image', name: 'image', label: 'Image', type: 'image' },
          { key: 'slide_caption', name: 'caption', label: 'Caption', type: 'text' },
        ],
      },
      {
        key: 'address',
        name: 'address',
        label: 'Address',
        type: 'group',
        sub_fields: [
          { key: 'address_street', name: 'street', label: 'Street', type: 'text' },
          { key: 'address_city', name: 'city', label: 'City', type: 'text' },
        ],
      },
      {
        key: 'sections',
        name: 'sections',
        label: 'Sections',
        type: 'flexible_content',
        layouts: {
          layout_hero: {
            name: 'hero_block',
            label: 'Hero Block',
            sub_fields: [
              { key: 'hero_heading', name: 'heading', label: 'Heading', type: 'text' },
              { key: 'hero_background', name: 'background', label: 'Background', type: 'image' },
            ],
          },
          layout_quote: {
            name: 'quote_block',
            label: 'Quote Block',
            sub_fields: [
              { key: 'quote_text', name: 'quote', label: 'Quote', type: 'textarea' },
              { key: 'quote_author', name: 'author', label: 'Author', type: 'user' },
            ],
          },
        },
      },
    ],
  }),
  parseFieldGroup({
    key: 'group_refs',
    title: 'References',
    fields: [
      { key: 'related', name: 'related', label: 'Related', type: 'relationship' },
      { key: 'topics', name: 'topics', label: 'Topics', type: 'taxonomy', taxonomy: 'category', multiple: true },
      { key: 'tags', name: 'tags', label: 'Tags', type: 'taxonomy', taxonomy: 'missing_tax', multiple: true },
      { key: 'reviewer', name: 'reviewer', label: 'Reviewer', type: 'user' },
      { key: 'website', name: 'website', label: 'Website', type: 'url' },
    ],
  }),
];
