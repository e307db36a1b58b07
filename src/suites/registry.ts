/**
 * Suite registry.
 *
 * A suite pairs a collaborator factory with the scenarios to run against
 * it. The HTTP explorer and the CLI both look suites up here.
 */

import { Collaborator } from '../domain/collaborator';
import { HarnessError, notFoundError, validationError } from '../domain/errors';
import { Scenario } from '../domain/scenario';

export interface SuiteDefinition {
  id: string;
  description: string;
  /** A fresh collaborator for one sweep, with a cleanup hook. */
  createCollaborator(): SuiteCollaborator;
  scenarios(): readonly Scenario[];
}

export interface SuiteCollaborator {
  collaborator: Collaborator;
  dispose(): void;
}

export interface SuiteSummary {
  id: string;
  description: string;
  scenarioIds: string[];
}

export class SuiteRegistry {
  private readonly suites = new Map<string, SuiteDefinition>();

  register(suite: SuiteDefinition): void {
    if (this.suites.has(suite.id)) {
      throw new HarnessError(validationError(`Suite already registered: ${suite.id}`, { suiteId: suite.id }));
    }
    this.suites.set(suite.id, suite);
  }

  has(suiteId: string): boolean {
    return this.suites.has(suiteId);
  }

  /** Throws a VALIDATION.NOT_FOUND HarnessError for unknown ids. */
  get(suiteId: string): SuiteDefinition {
    const suite = this.suites.get(suiteId);
    if (!suite) throw new HarnessError(notFoundError('Suite', suiteId));
    return suite;
  }

  list(): SuiteSummary[] {
    return [...this.suites.values()].map((suite) => ({
      id: suite.id,
      description: suite.description,
      scenarioIds: suite.scenarios().map((s) => s.id),
    }));
  }
}
