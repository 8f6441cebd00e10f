// Silence informational output during tests; errors are always shown
beforeAll(() => {
  const originalConsoleLog = console.log;
  const originalConsoleWarn = console.warn;

  jest.spyOn(console, "log").mockImplementation((...args) => {
    if (process.env.DEBUG) {
      originalConsoleLog(...args);
    }
  });

  jest.spyOn(console, "warn").mockImplementation((...args) => {
    if (process.env.DEBUG) {
      originalConsoleWarn(...args);
    }
  });
});

afterAll(() => {
  jest.restoreAllMocks();
});
