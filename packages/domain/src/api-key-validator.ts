import { type Project, type ProjectApiKey } from './project';
import {
  type ApiKeyRepository,
  type ProjectRepository,
  type Clock,
  type LoggerPort,
  type WithTransaction,
} from './ports';

export interface ApiKeyValidatorDeps<Tx> {
  apiKeyRepo: ApiKeyRepository<Tx>;
  projectRepo: ProjectRepository<Tx>;
  withTransaction: WithTransaction<Tx>;
  now: Clock;
  logger: LoggerPort;
}

/** Unknown, inactive and orphaned keys are deliberately indistinguishable. */
export type ApiKeyValidation =
  | { ok: true; project: Project; apiKey: ProjectApiKey }
  | { ok: false };

export class ApiKeyValidator<Tx = unknown> {
  constructor(private readonly deps: ApiKeyValidatorDeps<Tx>) {}

  async validate(keyValue: string): Promise<ApiKeyValidation> {
    const { apiKeyRepo, projectRepo, withTransaction } = this.deps;
    if (keyValue.length === 0) return { ok: false };

    const result = await withTransaction(async (tx): Promise<ApiKeyValidation> => {
      const apiKey = await apiKeyRepo.findByKey(tx, keyValue);
      if (!apiKey || !apiKey.isActive) return { ok: false };

      const project = await projectRepo.findById(tx, apiKey.projectId);
      if (!project || !project.isActive) return { ok: false };

      return { ok: true, project, apiKey };
    });

    if (result.ok) {
      await this.recordUse(result.apiKey);
    }
    return result;
  }

  // Separate transaction: a failed UPDATE must not abort the lookup or the request.
  private async recordUse(apiKey: ProjectApiKey): Promise<void> {
    const { apiKeyRepo, withTransaction, now, logger } = this.deps;
    try {
      await withTransaction((tx) => apiKeyRepo.touchLastUsed(tx, apiKey.id, now()));
    } catch (err) {
      logger.warn(
        { apiKeyId: apiKey.id, err: err instanceof Error ? err.message : String(err) },
        'Failed to record API key use',
      );
    }
  }
}
