export { createDatasourcesModule } from "./api"
export { createDatasourceServices, type DatasourceServices } from "./composition"
