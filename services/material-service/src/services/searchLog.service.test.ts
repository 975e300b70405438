import { SearchLogService, describeSearch } from './searchLog.service';
import { InMemoryDatabase, InMemorySearchLogStore } from '../testing/inMemoryStores';

const cse = { id: 'dept-1', name: 'Computer Science', shortCode: 'CSE' };

describe('describeSearch', () => {
  it('joins descriptors as department, semester, year', () => {
    expect(describeSearch({ year: 2024, semester: 3, department: cse })).toBe('department:CSE semester:3 year:2024');
  });

  it('includes only the filters that were applied', () => {
    expect(describeSearch({ semester: 5 })).toBe('semester:5');
    expect(describeSearch({ department: cse, year: 2023 })).toBe('department:CSE year:2023');
  });

  it('returns null without filters', () => {
    expect(describeSearch({})).toBeNull();
  });
});

describe('SearchLogService', () => {
  let db: InMemoryDatabase;
  let service: SearchLogService;

  beforeEach(() => {
    db = new InMemoryDatabase();
    service = new SearchLogService(new InMemorySearchLogStore(db));
  });

  it('appends one row per filtered search, tagged with the user', async () => {
    await service.logSearch({ semester: 3 }, 'alice');
    await service.logSearch({ semester: 3 }, null);

    expect(db.searchLogs.map((log) => [log.query, log.userId])).toEqual([
      ['semester:3', 'alice'],
      ['semester:3', null],
    ]);
  });

  it('skips unfiltered searches', async () => {
    await service.logSearch({}, 'alice');
    expect(db.searchLogs).toHaveLength(0);
  });

  it('ranks terms by count, then by most recent search', async () => {
    await service.logSearch({ semester: 1 }, null);
    await service.logSearch({ semester: 2 }, null);
    await service.logSearch({ semester: 2 }, null);
    await service.logSearch({ year: 2025 }, null);
    await service.logSearch({ semester: 1 }, null);
    await service.logSearch({ department: cse }, null);

    const terms = await service.topSearchTerms();

    // semester:1 was searched last among the two-count terms
    expect(terms.map((term) => [term.query, term.count])).toEqual([
      ['semester:1', 2],
      ['semester:2', 2],
      ['department:CSE', 1],
      ['year:2025', 1],
    ]);
    expect(terms[0].lastSearchedAt).toEqual(db.searchLogs[4].createdAt);
  });
});
