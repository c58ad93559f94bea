import { z } from "zod";

const emptyToUndefined = (value: unknown) => (value === "" ? undefined : value);

/** Page query shared by the paged list endpoints. */
export const pageQuerySchema = z.object({
  page: z.preprocess(emptyToUndefined, z.coerce.number().int().min(1).default(1)),
  pageSize: z.preprocess(emptyToUndefined, z.coerce.number().int().min(1).max(100).default(20)),
});

export type PaginatedResponse<T> = {
  data: T[];
  pageInfo: {
    page: number;
    pageSize: number;
    total: number;
  };
};
