/**
 * xmlspool CLI - render JSON document descriptions as XML
 */

export * from './description';
export { renderDescription, type RenderOptions } from './render';
