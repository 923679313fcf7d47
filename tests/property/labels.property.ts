/**
 * Property-based tests for Gmail labels
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { CommandBuilder } from '../../src/commands/builder.js';
import { MailMessage } from '../../src/message/message.js';
import { parseLabels } from '../../src/protocol/fetch-attributes.js';
import { createFakeSession, silentLogger } from '../helpers/fixtures.js';

const labelArb = fc.stringOf(
  fc.constantFrom('a', 'b', 'Z', '1', ' ', '/', '-', '[', ']', '"', '\\', 'é'),
  { minLength: 1, maxLength: 12 }
);

const quote = (label: string): string => `"${label.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;

describe('Gmail labels', () => {
  it('quoted labels parse back to the same set', () => {
    fc.assert(
      fc.property(
        fc.uniqueArray(labelArb, { maxLength: 8 }),
        (labels) => {
          const line = `* 1 FETCH (X-GM-LABELS (${labels.map(quote).join(' ')}) UID 5)`;
          expect(parseLabels(line)).toEqual(new Set(labels));
        }
      ),
      { numRuns: 100 }
    );
  });

  it('labels in a STORE command parse back to the same set', () => {
    fc.assert(
      fc.property(
        fc.uniqueArray(labelArb, { minLength: 1, maxLength: 8 }),
        (labels) => {
          const command = CommandBuilder.uidStoreLabels(5, labels, 'add');
          expect(parseLabels(command.replace('+X-GM-LABELS', 'X-GM-LABELS'))).toEqual(new Set(labels));
        }
      ),
      { numRuns: 100 }
    );
  });

  it('hasLabel is true exactly for the fetched labels', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.uniqueArray(labelArb, { maxLength: 6 }),
        labelArb,
        async (labels, probe) => {
          const session = createFakeSession({
            headerBlock: `* 1 FETCH (X-GM-LABELS (${labels.map(quote).join(' ')}) UID 42 FLAGS ())`,
          });
          const message = new MailMessage({ name: 'INBOX', session }, 42, { logger: silentLogger });

          expect(await message.hasLabel(probe)).toBe(labels.includes(probe));
          for (const label of labels) {
            expect(await message.hasLabel(label)).toBe(true);
          }
          expect(session.fetchByUid).toHaveBeenCalledTimes(1);
        }
      ),
      { numRuns: 50 }
    );
  });

  it('addLabel then removeLabel leaves the label absent', async () => {
    await fc.assert(
      fc.asyncProperty(labelArb, async (label) => {
        const session = createFakeSession();
        const message = new MailMessage({ name: 'INBOX', session }, 42, { logger: silentLogger });
        await message.load();

        await message.addLabel(label);
        expect(await message.hasLabel(label)).toBe(true);
        await message.removeLabel(label);
        expect(await message.hasLabel(label)).toBe(false);
      }),
      { numRuns: 50 }
    );
  });
});
