export { makeDeployCommand } from './deploy'
export { makeListCommand } from './list'
