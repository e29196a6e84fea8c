import type { CleanerErrorKind, DeletionCandidate, DeletionError, DeletionResult, ValidationResult } from '../types.js';
import { expandHome } from '../scanners/pattern-expander.js';
import { errorMessage, kindFromError } from '../utils/errors.js';
import { exists } from '../utils/fs.js';
import { defaultSafetyPolicy, describeValidation, normalizePath, validate, type SafetyPolicy } from '../utils/path-validator.js';
import type { TrashOutcome, TrashService } from '../utils/trash.js';

export interface DeletionOptions {
  trash: TrashService;
  policy?: SafetyPolicy;
  onProgress?: (completed: number, total: number, candidate: DeletionCandidate) => void;
}

function rejectionKind(result: ValidationResult): CleanerErrorKind {
  switch (result.kind) {
    case 'invalidPath':
      return 'InvalidInput';
    case 'doesNotExist':
      return 'NotFound';
    default:
      return 'PolicyViolation';
  }
}

/**
 * Moves candidates to the trash one at a time. Each candidate is validated
 * first; rejected ones are never touched. A failure is recorded and the batch
 * carries on, and nothing is retried. `freedBytes` is the sum of the sizes
 * measured at scan time for the candidates that were moved.
 */
export async function executeDeletion(
  candidates: readonly DeletionCandidate[],
  options: DeletionOptions
): Promise<DeletionResult> {
  const policy = options.policy ?? defaultSafetyPolicy();
  const errors: DeletionError[] = [];
  let successCount = 0;
  let freedBytes = 0;

  const reject = (path: string, kind: CleanerErrorKind, reason: string): void => {
    console.warn(`[Executor] Rejected ${path}: ${reason}`);
    errors.push({ path, kind, reason });
  };

  for (const [index, candidate] of candidates.entries()) {
    const validation = validate(candidate.path, policy);

    if (validation.kind !== 'safe') {
      reject(candidate.path, rejectionKind(validation), describeValidation(validation));
    } else {
      const target = normalizePath(expandHome(candidate.path.trim(), policy.homeDir));

      if (!(await exists(target))) {
        reject(candidate.path, 'NotFound', describeValidation({ kind: 'doesNotExist' }));
      } else {
        let outcome: TrashOutcome;
        try {
          outcome = await options.trash.moveToTrash(target);
        } catch (error) {
          outcome = { ok: false, kind: kindFromError(error), reason: errorMessage(error) };
        }
        if (outcome.ok) {
          successCount++;
          freedBytes += Math.max(0, candidate.size);
        } else {
          reject(candidate.path, outcome.kind, outcome.reason);
        }
      }
    }

    options.onProgress?.(index + 1, candidates.length, candidate);
  }

  console.log(`[Executor] Moved ${successCount}/${candidates.length} items to the Trash, ${errors.length} failed`);

  return { successCount, failedCount: errors.length, errors, freedBytes };
}

/** Paths of the candidates that were moved, for pruning the working set. */
export function deletedPaths(candidates: readonly DeletionCandidate[], result: DeletionResult): Set<string> {
  const failed = new Set(result.errors.map((e) => e.path));
  return new Set(candidates.map((c) => c.path).filter((path) => !failed.has(path)));
}
