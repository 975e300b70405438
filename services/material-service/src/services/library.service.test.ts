import { AccessPolicy } from './accessPolicy.service';
import { LibraryService } from './library.service';
import { InMemoryDatabase, createInMemoryStores } from '../testing/inMemoryStores';
import { staff, student } from '@campus-portal/shared/testing/callers';
import type { MaterialStores } from '../app';
import type { DepartmentSummary } from '../models/department.model';

describe('LibraryService', () => {
  let db: InMemoryDatabase;
  let stores: MaterialStores;
  let service: LibraryService;
  let department: DepartmentSummary;

  beforeEach(() => {
    db = new InMemoryDatabase();
    stores = createInMemoryStores(db);
    service = new LibraryService(stores.favorites, stores.recentViews, new AccessPolicy(stores.roles));
    department = db.addDepartment('Civil Engineering', 'CIV');
  });

  it('lists favorites newest first and recent views most recent first', async () => {
    const first = db.addMaterial({ department, uploaderId: 'u1' });
    const second = db.addMaterial({ department, uploaderId: 'u1' });

    await stores.favorites.toggle('alice', first.id);
    await stores.favorites.toggle('alice', second.id);
    await stores.recentViews.touch('alice', second.id);
    await stores.recentViews.touch('alice', first.id);

    const library = await service.library(student('alice'));

    expect(library.favorites.map((entry) => entry.material.id)).toEqual([second.id, first.id]);
    expect(library.recentlyViewed.map((entry) => entry.material.id)).toEqual([first.id, second.id]);
  });

  it('hides entries whose material is no longer approved from non-verifiers', async () => {
    const approved = db.addMaterial({ department, uploaderId: 'u1' });
    const withdrawn = db.addMaterial({ department, uploaderId: 'u1' });
    await stores.favorites.toggle('alice', approved.id);
    await stores.favorites.toggle('alice', withdrawn.id);
    const stored = db.material(withdrawn.id);
    if (stored) {
      stored.verificationStatus = 'rejected';
    }

    const library = await service.library(student('alice'));
    expect(library.favorites.map((entry) => entry.material.id)).toEqual([approved.id]);
  });

  it('keeps them for coordinators and staff', async () => {
    const pending = db.addMaterial({ department, uploaderId: 'u1', verificationStatus: 'pending' });
    await stores.favorites.toggle('cr-1', pending.id);
    await stores.favorites.toggle('staff-1', pending.id);
    db.coordinatorUserIds.add('cr-1');

    expect((await service.library(student('cr-1'))).favorites).toHaveLength(1);
    expect((await service.library(staff())).favorites).toHaveLength(1);
  });

  it('caps each section at twenty entries', async () => {
    for (let i = 0; i < 22; i++) {
      const material = db.addMaterial({ department, uploaderId: 'u1' });
      await stores.favorites.toggle('alice', material.id);
      await stores.recentViews.touch('alice', material.id);
    }

    const library = await service.library(student('alice'));
    expect(library.favorites).toHaveLength(20);
    expect(library.recentlyViewed).toHaveLength(20);
  });
});
