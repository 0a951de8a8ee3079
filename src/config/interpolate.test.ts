import { describe, it, expect } from "vitest";
import { interpolate } from "./interpolate.js";

describe("interpolate", () => {
  it("replaces ${VAR} with variable value", () => {
    const result = interpolate("Hello ${NAME}!", { NAME: "World" });
    expect(result).toBe("Hello World!");
  });

  it("replaces multiple variables", () => {
    const result = interpolate("${GREETING} ${NAME}!", { GREETING: "Hi", NAME: "User" });
    expect(result).toBe("Hi User!");
  });

  it("leaves unknown variables as empty string", () => {
    const result = interpolate("Hello ${UNKNOWN}!", {});
    expect(result).toBe("Hello !");
  });

  it("replaces ${ENV.VAR} from the given environment", () => {
    const result = interpolate("Value: ${ENV.PORT}", {}, { PORT: "8080" });
    expect(result).toBe("Value: 8080");
  });

  it("reads process.env by default", () => {
    process.env.CMDPROBE_INTERPOLATE_VAR = "test-value";
    const result = interpolate("Value: ${ENV.CMDPROBE_INTERPOLATE_VAR}", {});
    expect(result).toBe("Value: test-value");
    delete process.env.CMDPROBE_INTERPOLATE_VAR;
  });

  it("does not mix hook variables and environment", () => {
    const result = interpolate("${HOME}|${ENV.TOKEN}", { TOKEN: "var" }, { HOME: "/env-home" });
    expect(result).toBe("|");
  });

  it("leaves text without placeholders untouched", () => {
    expect(interpolate("$HOME and {NAME}", { NAME: "x" })).toBe("$HOME and {NAME}");
  });
});
