import { mkdir } from "node:fs/promises";
import { join } from "node:path";

import {
  err,
  ok,
  type Result,
  type SensorgateError,
  type SubjectId,
  type SubjectStoragePort,
} from "@sensorgate/contracts";

import { createError, describeError } from "./errors.js";

export interface DirectorySubjectStorageOptions {
  readonly root: string;
  readonly directoryName: string;
}

export const subjectStoragePath = (options: DirectorySubjectStorageOptions, subjectId: SubjectId): string =>
  join(options.root, "users", String(subjectId), options.directoryName);

/**
 * Keeps each subject's template data under `<root>/users/<subject>/<directoryName>`.
 */
export const createDirectorySubjectStorage = (options: DirectorySubjectStorageOptions): SubjectStoragePort => ({
  async prepare(subjectId: SubjectId): Promise<Result<string, SensorgateError>> {
    const path = subjectStoragePath(options, subjectId);
    try {
      await mkdir(path, { recursive: true });
      return ok(path);
    } catch (error) {
      return err(
        createError("subject.storage_unavailable", `Could not prepare template storage for subject ${subjectId}.`, {
          subjectId,
          path,
          cause: describeError(error),
        }),
      );
    }
  },
});
