export const ThemeMode = {
  System: 0,
  Light: 1,
  Dark: 2,
} as const;

export type ThemeMode = (typeof ThemeMode)[keyof typeof ThemeMode];

export const ThemeModeName: Record<ThemeMode, string> = {
  [ThemeMode.System]: 'System',
  [ThemeMode.Light]: 'Light',
  [ThemeMode.Dark]: 'Dark',
};

export function isThemeMode(value: number): value is ThemeMode {
  return value === ThemeMode.System || value === ThemeMode.Light || value === ThemeMode.Dark;
}
