// Kept in step with package.json by the release process
export const PACKAGE_INFO = {
  name: 'autoprint-archive',
  version: '0.1.0',
} as const;
