export default ["apps/*", "packages/*"];
