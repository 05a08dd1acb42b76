export const LOG_PREFIX = "[entrygraph]";

export const GO_MOD_FILE = "go.mod";

// Go sources, tests included; `includeTests` decides whether *_test.go count
export const GO_SOURCE_GLOB = "**/*.go";
export const GO_DIR_SOURCE_GLOB = "*.go";
export const GO_TEST_FILE = /_test\.go$/;

// Directories the go tool never treats as packages of the module
export const SCAN_IGNORE = [
  "**/node_modules/**",
  "**/vendor/**",
  "**/testdata/**",
  "**/.*/**",
  "**/_*/**",
];

export const WATCH_IGNORE: (string | RegExp)[] = [
  /(^|[\\/])\../, // dotfiles
  "**/node_modules",
  "**/vendor",
  "**/.git",
];
