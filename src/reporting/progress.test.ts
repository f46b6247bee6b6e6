import { consoleProgress, formatProgress } from "./progress";

describe("formatProgress", () => {
  it("prints the percentage with one decimal", () => {
    expect(formatProgress(1, 4)).toBe("25.0 % finished");
    expect(formatProgress(1, 3)).toBe("33.3 % finished");
    expect(formatProgress(3, 3)).toBe("100.0 % finished");
  });

  it("treats an empty run as finished", () => {
    expect(formatProgress(0, 0)).toBe("100.0 % finished");
  });
});

describe("consoleProgress", () => {
  it("writes one line per call", () => {
    const log = jest.fn();
    const onProgress = consoleProgress(log);
    onProgress(1, 8);
    onProgress(8, 8);
    expect(log.mock.calls).toEqual([["12.5 % finished"], ["100.0 % finished"]]);
  });

  it("logs to the console by default", () => {
    const logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    consoleProgress()(2, 4);
    expect(logSpy).toHaveBeenCalledWith("50.0 % finished");
    logSpy.mockRestore();
  });
});
