import path from "node:path";
import { describe, expect, it, vi } from "vitest";
import { isSyncEnabledFor, loadConfig, parseIdList, withModel } from "../src/config.js";

describe("parseIdList", () => {
  it("keeps integers and reports other entries", () => {
    const onInvalid = vi.fn();
    expect(parseIdList(" 1, -20 ,abc,,3.5", onInvalid)).toEqual([1, -20]);
    expect(onInvalid.mock.calls).toEqual([["abc"], ["3.5"]]);
    expect(parseIdList(undefined)).toEqual([]);
  });
});

describe("loadConfig", () => {
  it("applies defaults", () => {
    const cfg = loadConfig({});

    expect(cfg.port).toBe(5688);
    expect(cfg.apiKey).toBeNull();
    expect(cfg.allowedCallerIds).toEqual([]);
    expect(cfg.uploadLimitBytes).toBe(50 * 1024 * 1024);
    expect(cfg.pdfRenderCmd).toBe("weasyprint");
    expect(cfg.settingsFile).toBe(path.resolve(process.cwd(), "data", "user_settings.json"));
    expect(cfg.transcriber).toMatchObject({ model: "gemini-3-flash-preview", temperature: 1, thinkingLevel: "low" });
    expect(cfg.editor).toMatchObject({ model: "gemini-3-pro-preview", temperature: 1, thinkingLevel: "high" });
    expect(cfg.sync).toEqual({ rcloneCmd: "rclone", remotePath: null, enabledCallerIds: [] });
  });

  it("reads overrides and warns about bad ids", () => {
    const warnings: string[] = [];
    const cfg = loadConfig(
      {
        PORT: "8080",
        API_KEY: "test-secret",
        ALLOWED_CALLER_IDS: "1,x",
        EDITOR_THINKING_LEVEL: "LOW",
        TRANSCRIBER_TEMPERATURE: "0.2",
        RCLONE_REMOTE_PATH: "remote:Notes//",
        RCLONE_ENABLED_CALLER_IDS: "1",
      },
      (message) => warnings.push(message)
    );

    expect(cfg.port).toBe(8080);
    expect(cfg.apiKey).toBe("test-secret");
    expect(cfg.allowedCallerIds).toEqual([1]);
    expect(cfg.editor.thinkingLevel).toBe("low");
    expect(cfg.transcriber.temperature).toBe(0.2);
    expect(cfg.sync.remotePath).toBe("remote:Notes");
    expect(warnings).toEqual(["Ignoring invalid id in ALLOWED_CALLER_IDS: x"]);
    expect(isSyncEnabledFor(cfg.sync, 1)).toBe(true);
    expect(isSyncEnabledFor(cfg.sync, 2)).toBe(false);
  });

  it("returns frozen values and copies on model change", () => {
    const cfg = loadConfig({});
    expect(Object.isFrozen(cfg)).toBe(true);

    const pro = withModel(cfg.transcriber, "gemini-3-pro-preview");
    expect(pro.model).toBe("gemini-3-pro-preview");
    expect(cfg.transcriber.model).toBe("gemini-3-flash-preview");
    expect(withModel(cfg.transcriber, "gemini-3-flash-preview")).toBe(cfg.transcriber);
  });
});
