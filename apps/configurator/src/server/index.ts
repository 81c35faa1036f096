export { type BuiltServer, buildServer } from "./build-server"
