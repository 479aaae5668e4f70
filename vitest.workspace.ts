export default ["packages/sdk", "packages/cli"];
