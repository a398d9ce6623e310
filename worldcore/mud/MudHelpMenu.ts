// worldcore/mud/MudHelpMenu.ts

export const HELP_ENTRIES: { cmd: string; desc: string }[] = [
  // Meta
  { cmd: "help / ?", desc: "Show this help." },
  { cmd: "time", desc: "Show the time of day." },

  // World
  { cmd: "look / l", desc: "Describe the room you are in." },
  { cmd: "n, s, e, w, u, d", desc: "Walk through an exit." },
  { cmd: "go / move <dir>", desc: "Walk through an exit (synonyms)." },
  { cmd: "get / take <item>", desc: "Pick something up off the ground." },
  { cmd: "inv / inventory", desc: "Show what you are carrying." },

  // Combat
  { cmd: "attack / kill <target>", desc: "Start fighting, or switch targets." },
  { cmd: "use <maneuver> [target]", desc: "Spend stamina on a maneuver." },
  { cmd: "disengage / flee", desc: "Try to break away from the fight." },
  { cmd: "join", desc: "Join the fight in this room on your side." },
  { cmd: "advance", desc: "Close the distance by one range band." },
  { cmd: "retreat", desc: "Back off by one range band." },
];
