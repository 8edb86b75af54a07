export default [
  "packages/types",
  "packages/ledger",
  "packages/csv",
  "packages/cli",
];
