import { describe, it, expect } from "vitest";
import { GLOBAL_STATUS_QUERY, globalStatusScraper } from "./global-status.js";
import { createRegistry, loadDefaultRegistry } from "../registry/index.js";
import { MalformedValueError, QueryError } from "../errors.js";
import { FakeAdminDb, table } from "../test/fake-admin-db.js";
import { recordingSink, view } from "../test/recording-sink.js";

const COLUMNS = ["Variable_Name", "Variable_Value"];

describe("globalStatusScraper", () => {
  const registry = loadDefaultRegistry();

  it("maps registered variables to unlabelled samples", async () => {
    const db = new FakeAdminDb({
      [GLOBAL_STATUS_QUERY]: table(
        COLUMNS,
        ["Active_Transactions", "3"],
        ["Backend_query_time_nsec", "76355784684851"],
        ["Client_Connections_aborted", "0"],
        ["Client_Connections_connected", "64"],
        ["Client_Connections_created", "1087931"],
        ["Servers_table_version", "2019470"],
      ),
    });
    const sink = recordingSink();

    await globalStatusScraper.scrape(db, registry.mysql_status, sink);

    expect(db.queries).toEqual([GLOBAL_STATUS_QUERY]);
    expect(view(sink.samples)).toEqual([
      { name: "proxysql_mysql_status_active_transactions", kind: "gauge", labels: {}, value: 3 },
      { name: "proxysql_mysql_status_client_connections_aborted", kind: "counter", labels: {}, value: 0 },
      { name: "proxysql_mysql_status_client_connections_connected", kind: "gauge", labels: {}, value: 64 },
      { name: "proxysql_mysql_status_client_connections_created", kind: "counter", labels: {}, value: 1087931 },
    ]);
    expect(sink.rejected).toEqual([]);
  });

  it("publishes no labels", () => {
    expect(globalStatusScraper.labelNames("active_transactions")).toEqual([]);
  });

  it("skips a malformed value and keeps the rest", async () => {
    const db = new FakeAdminDb({
      [GLOBAL_STATUS_QUERY]: table(
        COLUMNS,
        ["Active_Transactions", "lots"],
        ["Client_Connections_connected", "64"],
      ),
    });
    const sink = recordingSink();

    await globalStatusScraper.scrape(db, registry.mysql_status, sink);

    expect(view(sink.samples)).toEqual([
      { name: "proxysql_mysql_status_client_connections_connected", kind: "gauge", labels: {}, value: 64 },
    ]);
    expect(sink.rejected).toHaveLength(1);
    expect(sink.rejected[0].field).toBe("active_transactions");
    expect(sink.rejected[0].raw).toBe("lots");
  });

  it("skips an overflowing value and keeps the rest", async () => {
    const db = new FakeAdminDb({
      [GLOBAL_STATUS_QUERY]: table(
        COLUMNS,
        ["Client_Connections_created", "1e400"],
        ["Active_Transactions", "3"],
      ),
    });
    const sink = recordingSink();

    await globalStatusScraper.scrape(db, registry.mysql_status, sink);

    expect(view(sink.samples)).toEqual([
      { name: "proxysql_mysql_status_active_transactions", kind: "gauge", labels: {}, value: 3 },
    ]);
    expect(sink.rejected.map((e) => e.message)).toEqual([
      'client_connections_created: "1e400" is out of range',
    ]);
  });

  it("rejects a negative counter", async () => {
    const db = new FakeAdminDb({
      [GLOBAL_STATUS_QUERY]: table(COLUMNS, ["Client_Connections_created", "-1"]),
    });
    const sink = recordingSink();

    await globalStatusScraper.scrape(db, registry.mysql_status, sink);

    expect(sink.samples).toEqual([]);
    expect(sink.rejected.map((e) => e.message)).toEqual([
      "client_connections_created: counter value -1 is negative",
    ]);
  });

  it("reports rows with the wrong number of fields", async () => {
    const db = new FakeAdminDb({
      [GLOBAL_STATUS_QUERY]: table(["Variable_Name", "Variable_Value", "Extra"], ["Active_Transactions", "3", "x"]),
    });
    const sink = recordingSink();

    await globalStatusScraper.scrape(db, registry.mysql_status, sink);

    expect(sink.samples).toEqual([]);
    expect(sink.rejected[0].message).toBe("Active_Transactions: expected 2 fields per row, got 3");
  });

  it("reports a placeholder registration instead of crashing", async () => {
    const reduced = createRegistry({
      mysql_status: {
        subsystem: "mysql_status",
        metrics: {
          questions: null,
          active_transactions: { name: "active_transactions", kind: "gauge", help: "Active transactions." },
        },
      },
      mysql_connection_pool: { subsystem: "connection_pool", metrics: {} },
      mysql_connection_list: { subsystem: "processlist", metrics: {} },
    });
    const db = new FakeAdminDb({
      [GLOBAL_STATUS_QUERY]: table(COLUMNS, ["Questions", "10"], ["Active_Transactions", "2"]),
    });
    const sink = recordingSink();

    await globalStatusScraper.scrape(db, reduced.mysql_status, sink);

    expect(view(sink.samples)).toEqual([
      { name: "proxysql_mysql_status_active_transactions", kind: "gauge", labels: {}, value: 2 },
    ]);
    expect(sink.rejected).toHaveLength(1);
    expect(sink.rejected[0]).toBeInstanceOf(MalformedValueError);
    expect(sink.rejected[0].code).toBe("PLACEHOLDER_DESCRIPTOR");
  });

  it("wraps a query failure in a QueryError", async () => {
    const db = new FakeAdminDb({ [GLOBAL_STATUS_QUERY]: new Error("an error") });

    const scrape = globalStatusScraper.scrape(db, registry.mysql_status, recordingSink());

    await expect(scrape).rejects.toThrow(QueryError);
    await expect(scrape).rejects.toThrow("query for mysql_status failed: an error");
  });
});
