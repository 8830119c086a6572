export { SceneCycleError, UnknownTagError } from './errors'
export { TagRegistry, UNTAGGED } from './tagRegistry'
export { SceneNode, type SceneNodeOptions } from './sceneNode'
export {
	loadScene,
	parseSceneFile,
	sceneFileSchema,
	sceneNodeSchema,
	type LoadedScene,
	type SceneFile,
	type SceneNodeDescription,
} from './schema'
export {
	inspectNode,
	inspectQuerySchema,
	type InspectEntry,
	type InspectQuery,
} from './inspect'
