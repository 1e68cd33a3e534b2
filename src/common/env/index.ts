let appName = '';

export function getAppName(): string {
  if (!appName) {
    appName = process.env.APP_NAME ?? 'ton-intent-decoder';
  }

  return appName;
}
