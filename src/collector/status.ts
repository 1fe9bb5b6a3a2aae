import type { NormalizedRow, ProjectRecord, ProjectStatus, StatusCodes } from "../shared/record.js";

// Source status id for a fully public entity.
export const PUBLIC_STATUS_CODE = 4;

/**
 * Child codes are averages over joined rows, so any child below 4 pulls the
 * average under 4. Children whose codes average to exactly 4 without each
 * being 4 still count as public.
 */
export const resolveStatus = ({ project, experiment, sample, run }: StatusCodes): ProjectStatus => {
  if (project !== PUBLIC_STATUS_CODE) return "private";
  if (experiment === PUBLIC_STATUS_CODE && sample === PUBLIC_STATUS_CODE && run === PUBLIC_STATUS_CODE) {
    return "public";
  }
  return "part private";
};

export const toProjectRecord = ({ statusCodes, ...fields }: NormalizedRow): ProjectRecord =>
  Object.freeze({
    ...fields,
    status: resolveStatus(statusCodes)
  });
