import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { homedir } from "os";
import { join } from "path";
import { cachePath, resolveConfig, segmentDir, statePath } from "../core/config.js";

describe("config", () => {
  it("defaults to the kafka preset", () => {
    assert.deepEqual(resolveConfig({}, {}), {
      project: "kafka",
      dataDir: join(homedir(), ".ipmentions", "kafka"),
      proposalPrefix: "KIP",
      mailingList: "dev",
      listDomain: "kafka.apache.org",
      archiveUrl: "https://lists.apache.org/api/mbox.lua",
      wikiUrl: "https://cwiki.apache.org/confluence",
      wikiSpaceKey: "KAFKA",
      wikiPageTitle: "Kafka Improvement Proposals",
      requestDelayMs: 1000,
    });
  });

  it("reads the environment", () => {
    const config = resolveConfig(
      {},
      {
        IPMENTIONS_PROJECT: "flink",
        IPMENTIONS_HOME: "/tmp/ipm",
        IPMENTIONS_ARCHIVE_URL: "http://localhost:8080/mbox",
        IPMENTIONS_REQUEST_DELAY_MS: "0",
      }
    );
    assert.equal(config.project, "flink");
    assert.equal(config.proposalPrefix, "FLIP");
    assert.equal(config.listDomain, "flink.apache.org");
    assert.equal(config.dataDir, "/tmp/ipm");
    assert.equal(config.archiveUrl, "http://localhost:8080/mbox");
    assert.equal(config.requestDelayMs, 0);
  });

  it("lets CLI options win over the environment", () => {
    const config = resolveConfig(
      { project: "kafka", dataDir: "/data" },
      { IPMENTIONS_PROJECT: "flink", IPMENTIONS_HOME: "/tmp/ipm" }
    );
    assert.equal(config.project, "kafka");
    assert.equal(config.dataDir, "/data");
  });

  it("rejects an unknown project", () => {
    assert.throws(() => resolveConfig({ project: "spark" }, {}), /Unknown project "spark". Expected one of: kafka, flink/);
  });

  it("rejects invalid values", () => {
    assert.throws(
      () => resolveConfig({}, { IPMENTIONS_ARCHIVE_URL: "not a url" }),
      /Invalid configuration: archiveUrl: Invalid url/
    );
    assert.throws(
      () => resolveConfig({}, { IPMENTIONS_REQUEST_DELAY_MS: "-5" }),
      /Invalid configuration: requestDelayMs/
    );
  });

  it("derives file locations from the data directory", () => {
    const config = resolveConfig({ dataDir: "/data" }, {});
    assert.equal(cachePath(config), join("/data", "mentions.csv"));
    assert.equal(statePath(config), join("/data", "state.db"));
    assert.equal(segmentDir(config), join("/data", "archives", "dev"));
  });
});
