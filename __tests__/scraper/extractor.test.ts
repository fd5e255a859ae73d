import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { readRankingTable } from '../../src/scraper/extractor.js';
import { selectFilter } from '../../src/scraper/navigator.js';
import type { ScrapeSession } from '../../src/scraper/session.js';
import { ExtractionError } from '../../src/errors/index.js';
import {
  FakePage,
  el,
  fakeSession,
  leaderboardDocument,
  rankingRows,
  wireDropdown,
  type LeaderboardDocument
} from '../helpers/fakePage.js';

const LOW = '$0.01/$0.02';
const HIGH = '$0.02/$0.05';

describe('extractor', () => {
  let doc: LeaderboardDocument;
  let frame: FakePage;
  let session: ScrapeSession;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2024-05-01T12:00:00Z'));

    doc = leaderboardDocument([LOW, HIGH], LOW, [
      { rank: '1', player: 'old_filter_player', country: 'DE', points: '999' }
    ]);
    frame = new FakePage(doc.root);
    wireDropdown(frame, doc);
    session = fakeSession(new FakePage(), frame);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('readRankingTable', () => {
    it('should wait for the previous filter rows to be replaced', async () => {
      frame.onClick(doc.options[1], () =>
        frame.schedule(1500, () =>
          doc.body.replaceChildren(
            ...rankingRows([
              { rank: '1', player: 'new_filter_player', country: 'SE', points: '1,181.00' },
              { rank: '2', player: 'second_player', country: 'FI', points: '950' }
            ])
          )
        )
      );

      await selectFilter(session, { index: 1, label: HIGH }, 10000);
      const start = Date.now();
      const table = await readRankingTable(session, { timeoutMs: 10000, settleMs: 500 });

      expect(table).toEqual({
        rows: [
          { rank: 1, player: 'new_filter_player', country: 'SE', points: 1181 },
          { rank: 2, player: 'second_player', country: 'FI', points: 950 }
        ],
        skippedRows: 0
      });
      // change seen at 1500ms, confirmed by one more equal read
      expect(Date.now() - start).toBe(2000);
      expect(session.tableSignature).toBeNull();
    });

    it('should fail the filter when the table never changes after the click', async () => {
      await selectFilter(session, { index: 1, label: HIGH }, 10000);
      const err = await readRankingTable(session, { timeoutMs: 3000, settleMs: 500 }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ExtractionError);
      expect(err).toMatchObject({
        filter: HIGH,
        message: `Failed to read ranking table for ${HIGH}: table did not change within 3000ms of selecting the filter`
      });
    });

    it('should not wait for a change when the filter was already shown', async () => {
      await selectFilter(session, { index: 0, label: LOW }, 10000);
      expect(session.tableSignature).toBeNull();

      const start = Date.now();
      const table = await readRankingTable(session, { timeoutMs: 10000, settleMs: 500 });

      expect(table.rows).toEqual([{ rank: 1, player: 'old_filter_player', country: 'DE', points: 999 }]);
      expect(Date.now() - start).toBe(500);
    });

    it('should read the country from the flag title, then its alt text', async () => {
      doc.body.replaceChildren(
        ...rankingRows([
          { rank: '1', player: 'alice', flag: { title: 'Germany', alt: 'de' }, points: '300' },
          { rank: '2', player: 'bob', flag: { alt: 'Sweden' }, points: '200' },
          { rank: '3', player: 'carol', flag: { title: '  ', alt: 'Finland' }, points: '150' },
          { rank: '4', player: 'dave', points: '100' }
        ])
      );
      session.currentFilter = LOW;

      const table = await readRankingTable(session, { timeoutMs: 5000, settleMs: 500 });

      expect(table.rows.map(r => [r.player, r.country])).toEqual([
        ['alice', 'Germany'],
        ['bob', 'Sweden'],
        ['carol', 'Finland'],
        ['dave', null]
      ]);
    });

    it('should skip unreadable rows and keep the rest', async () => {
      doc.body.replaceChildren(
        ...rankingRows([
          { rank: '1', player: 'alice', country: 'DE', points: 'n/a' },
          { rank: '2', player: 'bob', country: 'SE', points: '200' }
        ])
      );
      session.currentFilter = LOW;

      const table = await readRankingTable(session, { timeoutMs: 5000, settleMs: 500 });

      expect(table).toEqual({
        rows: [{ rank: 2, player: 'bob', country: 'SE', points: 200 }],
        skippedRows: 1
      });
    });

    it('should raise ExtractionError when the table body never appears', async () => {
      session.frame = new FakePage(el('html', el('body', el('p', 'Loading'))));
      session.currentFilter = LOW;

      const err = await readRankingTable(session, { timeoutMs: 2000, settleMs: 500 }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ExtractionError);
      expect(err).toMatchObject({
        filter: LOW,
        message: `Failed to read ranking table for ${LOW}: Timeout 2000ms exceeded`
      });
    });
  });
});
