/**
 * Jest setup file.
 * Keep the logger quiet and provide a global fetch mock tests can stub.
 */

declare const global: { fetch?: typeof fetch };

if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = 'silent';
}

if (!global.fetch) {
  global.fetch = (jest.fn() as unknown) as typeof fetch;
}

export {};
