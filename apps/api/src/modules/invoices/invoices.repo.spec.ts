import { InvoicesRepository } from "./invoices.repo";
import { DatabaseService, type DbExecutor } from "../../database/database.service";

const createRepo = () => {
  const query = jest.fn().mockResolvedValue([]);
  const tx: DbExecutor = { query };
  const repo = new InvoicesRepository({} as unknown as DatabaseService);
  return { query, tx, repo };
};

const sqlOf = (query: jest.Mock, call = 0) => String(query.mock.calls[call][0]).replace(/\s+/g, " ");

describe("InvoicesRepository", () => {
  it("locks a party's outstanding invoices in id order", async () => {
    const { query, tx, repo } = createRepo();

    await repo.lockOutstandingForParty("party-acme", tx);

    expect(sqlOf(query)).toContain("ORDER BY id FOR UPDATE");
    expect(query.mock.calls[0][1]).toEqual(["party-acme"]);
  });

  it("locks invoices by id in the same order", async () => {
    const { query, tx, repo } = createRepo();

    await repo.lockByIds(["invoice-b", "invoice-a"], tx);

    expect(sqlOf(query)).toContain("ORDER BY id FOR UPDATE");
    expect(query.mock.calls[0][1]).toEqual([["invoice-b", "invoice-a"]]);
  });

  it("takes no locks when there are no ids", async () => {
    const { query, tx, repo } = createRepo();

    await expect(repo.lockByIds([], tx)).resolves.toEqual([]);
    expect(query).not.toHaveBeenCalled();
  });
});
