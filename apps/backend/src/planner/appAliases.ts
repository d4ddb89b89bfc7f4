const APP_ALIASES: Record<string, string> = {
  音乐: "Music",
  音乐app: "Music",
  "apple music": "Music",
  日历: "Calendar",
  日程: "Calendar",
  备忘录: "Notes",
  提醒事项: "Reminders",
  通讯录: "Contacts",
  邮件: "Mail",
  "邮件.app": "Mail",
  计算器: "Calculator",
  终端: "Terminal",
  系统设置: "System Settings",
  系统偏好设置: "System Settings",
  相册: "Photos",
};

/** Maps a spoken application name to the name the OS launcher expects. */
export function resolveAppName(name: string): string {
  const trimmed = name.trim();
  return APP_ALIASES[trimmed.toLowerCase()] ?? trimmed;
}
