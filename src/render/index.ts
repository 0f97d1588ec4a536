export { toRenderCommands, type RenderCommand } from './commands';
