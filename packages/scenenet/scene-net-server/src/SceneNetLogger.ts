export type SceneNetLogFunction = (...args: Array<unknown>) => void;

export type SceneNetLogger = {
  trace: SceneNetLogFunction;
  debug: SceneNetLogFunction;
  info: SceneNetLogFunction;
  warn: SceneNetLogFunction;
  error: SceneNetLogFunction;
};

export class SceneNetConsoleLogger implements SceneNetLogger {
  trace(...args: Array<unknown>) {
    console.trace(...args);
  }

  debug(...args: Array<unknown>) {
    console.debug(...args);
  }

  info(...args: Array<unknown>) {
    console.info(...args);
  }

  warn(...args: Array<unknown>) {
    console.warn(...args);
  }

  error(...args: Array<unknown>) {
    console.error(...args);
  }
}
