import { withStorage, type Db, type Queryable } from './db.js';
import { ulid } from './ulid.js';
import { ProjectSchema, type Project } from './types.js';
import { NotFoundError } from './errors.js';

export interface CreateProjectInput {
  name: string;
  metadata?: Record<string, unknown> | null;
}

export async function createProject(db: Db, input: CreateProjectInput): Promise<Project> {
  const row = await withStorage(() =>
    db.one(
      `INSERT INTO projects(id, name, metadata)
       VALUES($1, $2, $3::jsonb)
       RETURNING *`,
      [ulid(), input.name, input.metadata == null ? null : JSON.stringify(input.metadata)]
    )
  );
  return ProjectSchema.parse(row);
}

export async function getProject(db: Queryable, projectId: string): Promise<Project | null> {
  const row = await withStorage(() => db.oneOrNone(`SELECT * FROM projects WHERE id = $1`, [projectId]));
  return row ? ProjectSchema.parse(row) : null;
}

export async function listProjects(db: Db, options: { limit?: number } = {}): Promise<Project[]> {
  const { limit } = options;
  const rows = await withStorage(() =>
    limit === undefined
      ? db.manyOrNone(`SELECT * FROM projects ORDER BY created_at DESC, id DESC`)
      : db.manyOrNone(`SELECT * FROM projects ORDER BY created_at DESC, id DESC LIMIT $1`, [limit])
  );
  return rows.map(row => ProjectSchema.parse(row));
}

/**
 * Deletes a project. Its tasks, their tool runs and their history go with it
 * through the foreign-key cascade.
 */
export async function deleteProject(db: Db, projectId: string): Promise<void> {
  const deleted = await withStorage(() =>
    db.manyOrNone(`DELETE FROM projects WHERE id = $1 RETURNING id`, [projectId])
  );
  if (deleted.length === 0) {
    throw new NotFoundError('project', projectId);
  }
}

/** Slug used when offering known projects to the refine stage. */
export function projectSlug(project: Project): string {
  const fromMetadata = project.metadata?.slug;
  if (typeof fromMetadata === 'string' && fromMetadata.trim()) {
    return fromMetadata.trim();
  }
  return project.name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}
