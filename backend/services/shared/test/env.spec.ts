// backend/services/shared/test/env.spec.ts
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { envFileCandidates, loadEnvCascadeForService } from "../src/env";

describe("env cascade", () => {
  let root: string;
  let serviceDir: string;
  const saved = { ...process.env };

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "scoring-env-"));
    fs.writeFileSync(path.join(root, "package.json"), "{}");
    serviceDir = path.join(root, "services", "svc");
    fs.mkdirSync(serviceDir, { recursive: true });
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
    process.env = { ...saved };
  });

  it("lists service, family and repo files per mode", () => {
    const files = envFileCandidates(serviceDir, "test").map((p) =>
      path.relative(root, p)
    );
    expect(files).toEqual([
      path.join("services", "svc", "env.test"),
      path.join("services", "svc", ".env.test"),
      path.join("services", "svc", ".env"),
      path.join("services", "env.test"),
      path.join("services", ".env.test"),
      path.join("services", ".env"),
      "env.test",
      ".env.test",
      ".env",
    ]);
  });

  it("production only looks at .env", () => {
    const files = envFileCandidates(serviceDir, "production");
    expect(files.every((p) => path.basename(p) === ".env")).toBe(true);
    expect(files).toHaveLength(3);
  });

  it("the service layer wins, existing env is kept and values expand", () => {
    fs.writeFileSync(
      path.join(root, ".env.test"),
      "SCORING_T_HOST=root\nSCORING_T_PORT=1\n"
    );
    fs.writeFileSync(
      path.join(serviceDir, "env.test"),
      "SCORING_T_HOST=svc\nSCORING_T_URL=http://${SCORING_T_HOST}:9\n"
    );
    process.env.NODE_ENV = "test";
    process.env.SCORING_T_PORT = "7";

    const loaded = loadEnvCascadeForService(serviceDir);

    expect(loaded).toEqual([
      path.join(serviceDir, "env.test"),
      path.join(root, ".env.test"),
    ]);
    expect(process.env.SCORING_T_HOST).toBe("svc");
    expect(process.env.SCORING_T_PORT).toBe("7");
    expect(process.env.SCORING_T_URL).toBe("http://svc:9");
  });
});
