/**
 * In-process stand-ins for the Postgres repositories, used by the service tests.
 * All stores share one InMemoryDatabase so cross-table effects stay visible.
 */

import type { MaterialStores } from '../app';
import type { UserRoleDirectory } from '../models/coordinator.model';
import type { DepartmentLookup, DepartmentSummary } from '../models/department.model';
import type {
  FavoriteEntry,
  FavoriteStore,
  FavoriteToggleResult,
  UserMaterialListQuery,
} from '../models/favorite.model';
import type { RecentViewEntry, RecentViewStore } from '../models/recentView.model';
import type { SearchLogStore, SearchTermStat } from '../models/searchQueryLog.model';
import type {
  DecisionAudit,
  MaterialCounter,
  ModerationDecision,
  StudyMaterial,
  StudyMaterialCreateInput,
  StudyMaterialListQuery,
  StudyMaterialStore,
  VerificationStatus,
} from '../models/studyMaterial.model';
import type { UploadAudit, UploadAuditStore } from '../models/uploadAudit.model';
import { compareByEngagement } from '../utils/engagement';

interface FavoriteRecord {
  userId: string;
  materialId: string;
  createdAt: Date;
}

interface RecentViewRecord {
  userId: string;
  materialId: string;
  lastViewedAt: Date;
}

interface SearchLogRecord {
  query: string;
  userId: string | null;
  createdAt: Date;
}

const COUNTER_FIELDS = {
  downloads: 'downloadsCount',
  views: 'viewsCount',
  favorites: 'favoritesCount',
} as const satisfies Record<MaterialCounter, keyof StudyMaterial>;

export class InMemoryDatabase {
  departments: DepartmentSummary[] = [];
  materials: StudyMaterial[] = [];
  audits: UploadAudit[] = [];
  coordinatorUserIds = new Set<string>();
  favorites: FavoriteRecord[] = [];
  recentViews: RecentViewRecord[] = [];
  searchLogs: SearchLogRecord[] = [];

  private sequence = 0;
  private currentTime = Date.parse('2026-01-05T09:00:00.000Z');

  /** Every call moves the clock one second forward, so insertion order is also time order */
  now(): Date {
    this.currentTime += 1000;
    return new Date(this.currentTime);
  }

  nextId(): string {
    this.sequence += 1;
    return `00000000-0000-4000-8000-${this.sequence.toString().padStart(12, '0')}`;
  }

  addDepartment(name: string, shortCode: string): DepartmentSummary {
    const department = { id: this.nextId(), name, shortCode };
    this.departments.push(department);
    return department;
  }

  /**
   * Inserts a material directly, bypassing the upload flow
   */
  addMaterial(overrides: Partial<StudyMaterial> & { department: DepartmentSummary; uploaderId: string }): StudyMaterial {
    const material: StudyMaterial = {
      id: this.nextId(),
      title: 'Untitled material',
      description: null,
      fileDriveId: null,
      fileType: 'pdf',
      subjectTags: [],
      semester: 1,
      year: 2025,
      verificationStatus: 'approved',
      verifierId: null,
      uploadedAt: this.now(),
      verifiedAt: null,
      downloadsCount: 0,
      viewsCount: 0,
      thumbsUpCount: 0,
      favoritesCount: 0,
      ...overrides,
    };
    this.materials.push(material);
    return { ...material };
  }

  material(id: string): StudyMaterial | undefined {
    return this.materials.find((material) => material.id === id);
  }
}

function byVisibility(status?: VerificationStatus) {
  return (material: StudyMaterial) => !status || material.verificationStatus === status;
}

export class InMemoryStudyMaterialStore implements StudyMaterialStore {
  constructor(private readonly db: InMemoryDatabase) {}

  async create(input: StudyMaterialCreateInput): Promise<StudyMaterial> {
    const department = this.db.departments.find((d) => d.id === input.departmentId);
    if (!department) {
      throw new Error(`department ${input.departmentId} does not exist`);
    }
    const material = this.db.addMaterial({
      department,
      uploaderId: input.uploaderId,
      title: input.title,
      description: input.description ?? null,
      fileDriveId: input.fileDriveId ?? null,
      fileType: input.fileType,
      subjectTags: [...input.subjectTags],
      semester: input.semester,
      year: input.year,
      verificationStatus: 'pending',
    });
    this.db.audits.push({
      id: this.db.nextId(),
      materialId: material.id,
      userId: input.uploaderId,
      action: 'upload',
      reason: 'Initial upload',
      createdAt: this.db.now(),
    });
    return material;
  }

  async findById(id: string): Promise<StudyMaterial | null> {
    const material = this.db.material(id);
    return material ? { ...material } : null;
  }

  async list(query: StudyMaterialListQuery): Promise<StudyMaterial[]> {
    return this.db.materials
      .filter(byVisibility(query.status))
      .filter((m) => !query.departmentId || m.department.id === query.departmentId)
      .filter((m) => query.semester === undefined || m.semester === query.semester)
      .filter((m) => query.year === undefined || m.year === query.year)
      .sort((a, b) => b.uploadedAt.getTime() - a.uploadedAt.getTime())
      .slice(0, query.limit)
      .map((m) => ({ ...m }));
  }

  async incrementCounter(id: string, counter: MaterialCounter, delta: number): Promise<number | null> {
    const material = this.db.material(id);
    if (!material) {
      return null;
    }
    const field = COUNTER_FIELDS[counter];
    material[field] += delta;
    return material[field];
  }

  async applyDecision(id: string, decision: ModerationDecision, audit: DecisionAudit): Promise<StudyMaterial | null> {
    const material = this.db.material(id);
    if (!material) {
      return null;
    }
    material.verificationStatus = decision.status;
    material.verifierId = decision.verifierId;
    if (decision.stampVerifiedAt) {
      material.verifiedAt = audit.decidedAt;
    }
    this.db.audits.push({
      id: this.db.nextId(),
      materialId: id,
      userId: decision.verifierId,
      action: 'edit',
      reason: audit.reason,
      createdAt: audit.decidedAt,
    });
    return { ...material };
  }

  async topByEngagement(options: { limit: number; status?: VerificationStatus }): Promise<StudyMaterial[]> {
    return this.db.materials
      .filter(byVisibility(options.status))
      .sort(compareByEngagement)
      .slice(0, options.limit)
      .map((m) => ({ ...m }));
  }
}

export class InMemoryUploadAuditStore implements UploadAuditStore {
  constructor(private readonly db: InMemoryDatabase) {}

  async listForMaterial(materialId: string): Promise<UploadAudit[]> {
    return this.db.audits
      .filter((audit) => audit.materialId === materialId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map((audit) => ({ ...audit }));
  }
}

export class InMemoryDepartmentLookup implements DepartmentLookup {
  constructor(private readonly db: InMemoryDatabase) {}

  async resolve(reference: string): Promise<DepartmentSummary | null> {
    const trimmed = reference.trim();
    const department = this.db.departments.find(
      (d) => d.id === trimmed || d.shortCode.toUpperCase() === trimmed.toUpperCase()
    );
    return department ? { ...department } : null;
  }
}

export class InMemoryUserRoleDirectory implements UserRoleDirectory {
  constructor(private readonly db: InMemoryDatabase) {}

  async hasCoordinatorRole(userId: string): Promise<boolean> {
    return this.db.coordinatorUserIds.has(userId);
  }
}

export class InMemoryFavoriteStore implements FavoriteStore {
  constructor(private readonly db: InMemoryDatabase) {}

  async toggle(userId: string, materialId: string): Promise<FavoriteToggleResult> {
    const material = this.db.material(materialId);
    if (!material) {
      throw new Error(`material ${materialId} does not exist`);
    }

    const index = this.db.favorites.findIndex((f) => f.userId === userId && f.materialId === materialId);
    if (index >= 0) {
      this.db.favorites.splice(index, 1);
      material.favoritesCount -= 1;
      return { favorited: false, favoritesCount: material.favoritesCount };
    }

    this.db.favorites.push({ userId, materialId, createdAt: this.db.now() });
    material.favoritesCount += 1;
    return { favorited: true, favoritesCount: material.favoritesCount };
  }

  async exists(userId: string, materialId: string): Promise<boolean> {
    return this.db.favorites.some((f) => f.userId === userId && f.materialId === materialId);
  }

  async listForUser(userId: string, query: UserMaterialListQuery): Promise<FavoriteEntry[]> {
    const entries: FavoriteEntry[] = [];
    for (const favorite of this.db.favorites) {
      const material = this.db.material(favorite.materialId);
      if (favorite.userId === userId && material && byVisibility(query.status)(material)) {
        entries.push({ material: { ...material }, favoritedAt: favorite.createdAt });
      }
    }
    return entries
      .sort((a, b) => b.favoritedAt.getTime() - a.favoritedAt.getTime())
      .slice(0, query.limit);
  }
}

export class InMemoryRecentViewStore implements RecentViewStore {
  constructor(private readonly db: InMemoryDatabase) {}

  async touch(userId: string, materialId: string): Promise<void> {
    const existing = this.db.recentViews.find((r) => r.userId === userId && r.materialId === materialId);
    if (existing) {
      existing.lastViewedAt = this.db.now();
      return;
    }
    this.db.recentViews.push({ userId, materialId, lastViewedAt: this.db.now() });
  }

  async listForUser(userId: string, query: UserMaterialListQuery): Promise<RecentViewEntry[]> {
    const entries: RecentViewEntry[] = [];
    for (const view of this.db.recentViews) {
      const material = this.db.material(view.materialId);
      if (view.userId === userId && material && byVisibility(query.status)(material)) {
        entries.push({ material: { ...material }, lastViewedAt: view.lastViewedAt });
      }
    }
    return entries
      .sort((a, b) => b.lastViewedAt.getTime() - a.lastViewedAt.getTime())
      .slice(0, query.limit);
  }
}

export class InMemorySearchLogStore implements SearchLogStore {
  constructor(private readonly db: InMemoryDatabase) {}

  async append(query: string, userId: string | null): Promise<void> {
    this.db.searchLogs.push({ query, userId, createdAt: this.db.now() });
  }

  async topQueries(limit: number): Promise<SearchTermStat[]> {
    const grouped = new Map<string, SearchTermStat>();
    for (const log of this.db.searchLogs) {
      const stat = grouped.get(log.query);
      if (!stat) {
        grouped.set(log.query, { query: log.query, count: 1, lastSearchedAt: log.createdAt });
      } else {
        stat.count += 1;
        if (log.createdAt > stat.lastSearchedAt) {
          stat.lastSearchedAt = log.createdAt;
        }
      }
    }
    return [...grouped.values()]
      .sort((a, b) => b.count - a.count || b.lastSearchedAt.getTime() - a.lastSearchedAt.getTime())
      .slice(0, limit);
  }
}

export function createInMemoryStores(db: InMemoryDatabase = new InMemoryDatabase()): MaterialStores {
  return {
    materials: new InMemoryStudyMaterialStore(db),
    audits: new InMemoryUploadAuditStore(db),
    departments: new InMemoryDepartmentLookup(db),
    roles: new InMemoryUserRoleDirectory(db),
    favorites: new InMemoryFavoriteStore(db),
    recentViews: new InMemoryRecentViewStore(db),
    searchLogs: new InMemorySearchLogStore(db),
  };
}
