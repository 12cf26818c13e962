import { v4 as uuidv4 } from 'uuid';
import type { Project, ProjectCreateInput, StoredDocument } from '../types/index.js';
import type { StorageProvider } from '../storage/index.js';
import { decodeRecord, readRecord, toDocument } from '../storage/index.js';
import {
  validate,
  createProjectSchema,
  projectIdSchema,
  projectNameSchema,
  projectRegistryRecordSchema,
} from '../utils/validation.js';
import { CoordinationError, NotFoundError } from '../utils/errors.js';
import { createComponentLogger } from '../utils/logger.js';

export const PROJECT_REGISTRY_KEY = 'global/project_registry';
const REGISTRY_ID = 'project_registry';

/**
 * Service for managing projects. All projects live in one registry document.
 */
export class ProjectService {
  private log = createComponentLogger('ProjectService');

  constructor(private storage: StorageProvider) {}

  /**
   * Create a new project. Names are unique among live projects.
   */
  async createProject(input: ProjectCreateInput): Promise<Project> {
    const { name, description } = validate(createProjectSchema, input);
    const now = new Date();
    const project: Project = {
      id: uuidv4(),
      name,
      description,
      createdAt: now,
      updatedAt: now,
      version: 1,
      isDeleted: false,
    };

    await this.storage.mutate(PROJECT_REGISTRY_KEY, (current) => {
      const projects = this.decodeProjects(current);
      if (projects.some(p => p.name === name && !p.isDeleted)) {
        throw new CoordinationError('CONFLICT', `Project with name "${name}" already exists`, { name });
      }
      return this.registryDocument([...projects, project]);
    });

    this.log.info('Project created', { projectId: project.id, projectName: name });
    return project;
  }

  /**
   * Get a project by ID
   */
  async getProject(projectId: string): Promise<Project | null> {
    const id = validate(projectIdSchema, projectId);
    const projects = await this.readProjects();
    return projects.find(p => p.id === id && !p.isDeleted) ?? null;
  }

  async getProjectByName(name: string): Promise<Project | null> {
    const validatedName = validate(projectNameSchema, name);
    const projects = await this.readProjects();
    return projects.find(p => p.name === validatedName && !p.isDeleted) ?? null;
  }

  /**
   * List projects (live only by default)
   */
  async listProjects(includeDeleted: boolean = false): Promise<Project[]> {
    const projects = await this.readProjects();
    return projects
      .filter(p => includeDeleted || !p.isDeleted)
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  /**
   * Delete a project (soft delete)
   */
  async deleteProject(projectId: string): Promise<Project> {
    const id = validate(projectIdSchema, projectId);
    const now = new Date();

    const stored = await this.storage.mutate(PROJECT_REGISTRY_KEY, (current) => {
      const projects = this.decodeProjects(current);
      if (!projects.some(p => p.id === id && !p.isDeleted)) {
        throw new NotFoundError('Project', id);
      }
      return this.registryDocument(projects.map(p =>
        p.id === id ? { ...p, isDeleted: true, updatedAt: now, version: p.version + 1 } : p
      ));
    });

    const deleted = this.decodeProjects(stored).find(p => p.id === id);
    if (!deleted) {
      throw new NotFoundError('Project', id);
    }
    this.log.info('Project deleted', { projectId: id, projectName: deleted.name });
    return deleted;
  }

  private async readProjects(): Promise<Project[]> {
    const { record } = await readRecord(this.storage, PROJECT_REGISTRY_KEY, projectRegistryRecordSchema);
    return record ? record.projects : [];
  }

  private decodeProjects(document: StoredDocument | null): Project[] {
    return document ? decodeRecord(PROJECT_REGISTRY_KEY, projectRegistryRecordSchema, document).projects : [];
  }

  private registryDocument(projects: Project[]) {
    return toDocument(REGISTRY_ID, { projects });
  }
}
