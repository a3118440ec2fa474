import createDebug from 'debug';

// Every diagnostic namespace hangs off this prefix, e.g. `stillframe:encoder`.
const BASE_NAMESPACE = 'stillframe';

export const makeDebug = (scope: string): createDebug.Debugger =>
  createDebug(`${BASE_NAMESPACE}:${scope}`);

export const enableDebugLogging = (pattern = `${BASE_NAMESPACE}:*`): void => {
  createDebug.enable(pattern);
};

export default makeDebug;
