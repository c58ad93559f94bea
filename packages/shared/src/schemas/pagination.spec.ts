import { pageQuerySchema } from "./pagination";

describe("pageQuerySchema", () => {
  it("defaults to the first page of twenty", () => {
    expect(pageQuerySchema.parse({})).toEqual({ page: 1, pageSize: 20 });
  });

  it("coerces query strings and treats empty values as absent", () => {
    expect(pageQuerySchema.parse({ page: "3", pageSize: "" })).toEqual({ page: 3, pageSize: 20 });
  });

  it("drops sort and search parameters the lists do not support", () => {
    expect(pageQuerySchema.parse({ page: "2", sortBy: "invoiceNo", q: "acme" })).toEqual({ page: 2, pageSize: 20 });
  });

  it("caps the page size at 100", () => {
    expect(pageQuerySchema.safeParse({ pageSize: "101" }).success).toBe(false);
  });
});
