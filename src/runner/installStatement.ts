import { ValidationError } from '../errors.js';

export function mergePackages(declared: readonly string[], scanned: readonly string[]): string[] {
  return Array.from(new Set([...declared, ...scanned]));
}

// JSON string escaping is also valid Python string syntax for these names
function pythonString(value: string): string {
  return JSON.stringify(value);
}

/**
 * Python that pip-installs `packages` into the session's interpreter.
 */
export function buildInstallStatement(packages: readonly string[]): string {
  if (packages.length === 0) {
    throw new ValidationError('at least one package is required', 'packages');
  }
  const pkgList = packages.map(pythonString).join(', ');
  return (
    'import subprocess, sys\n' +
    `subprocess.check_call([sys.executable, '-m', 'pip', 'install', ${pkgList}, '-q'])`
  );
}
