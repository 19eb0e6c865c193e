/**
 * XML Parsing and Navigation Utilities
 *
 * Provides parsing plus the navigation primitives every package part is read with:
 * - {@link visitTree} - depth-first traversal with per-node control over descent
 * - {@link forEachChildElement} - flat walk over the child elements of one node
 * - {@link findNode} - dotted-path lookup (`"worksheet.sheetData"`, `"c.v.text"`)
 * - {@link forEachAttribute} - ordered attribute iteration with early stop
 *
 * Nodes are named the way paths spell them: elements by their local name (namespace prefix
 * stripped, so `<x:row>` is `row`) and text/CDATA nodes as `text`. Indentation whitespace
 * between elements is not a node, so indented and compact documents navigate identically.
 *
 * @module xmlUtils
 */

import { DOMParser } from '@xmldom/xmldom';
import type { XlsxGridConfig } from '../types';
import { getGridError, GridErrorType, logWarning } from './errorUtils';

/** Separator between tag names in a {@link findNode} path. */
export const XML_PATH_SEPARATOR = '.';

/** Deepest level {@link visitTree} and {@link findNode} will descend to. */
export const MAX_XML_DEPTH = 1000;

/** Name given to text and CDATA nodes. */
export const TEXT_NODE_NAME = 'text';

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

const XML_WHITESPACE = /^[ \t\r\n]*$/;

/**
 * What {@link visitTree} should do after a callback has seen a node.
 */
export enum VisitAction {
    /** Visit this node's children before moving on to its next sibling. */
    Descend = 'descend',
    /** Do not visit this node's children; continue with its next sibling. */
    Skip = 'skip',
    /** Stop the whole traversal. */
    Abort = 'abort'
}

/**
 * Called for each node seen by {@link visitTree}.
 * `depth` is the node's level (its parent's depth + 1) and `index` its position among its siblings.
 * Returning nothing means {@link VisitAction.Descend}.
 */
export type VisitCallback = (node: Node, depth: number, index: number) => VisitAction | void;

/**
 * Called for each attribute seen by {@link forEachAttribute}.
 * Return {@link VisitAction.Abort} to stop early; anything else continues.
 */
export type AttributeCallback = (attr: Attr, index: number) => VisitAction | void;

/**
 * Called for each child element seen by {@link forEachChildElement}.
 * Return {@link VisitAction.Abort} to stop early; anything else continues.
 */
export type ElementCallback = (element: Element, index: number) => VisitAction | void;

export const isElement = (node: Node): node is Element => node.nodeType === ELEMENT_NODE;

export const isTextNode = (node: Node): node is CharacterData =>
    node.nodeType === TEXT_NODE || node.nodeType === CDATA_SECTION_NODE;

const localName = (qualifiedName: string): string => {
    const colon = qualifiedName.indexOf(':');
    return colon < 0 ? qualifiedName : qualifiedName.slice(colon + 1);
};

/**
 * Parses an XML string into a DOM Document.
 *
 * Uses the @xmldom/xmldom library. Every error or fatal error the parser reports is collected,
 * and a document with any of them (or without a root element) is rejected.
 *
 * @param xml - The XML content as a string
 * @param config - Configuration, used for warnings and error reporting
 * @param partName - Name of the part being parsed, for error messages
 * @returns The parsed document
 * @throws {GridError} FORMAT_ERROR if the XML is not well formed
 */
export const parseXmlString = (xml: string, config: XlsxGridConfig = {}, partName = 'XML document'): Document => {
    const problems: string[] = [];
    const parser = new DOMParser({
        errorHandler: {
            warning: (msg: unknown) => logWarning(`${partName}: ${String(msg)}`, config),
            error: (msg: unknown) => { problems.push(String(msg)); },
            fatalError: (msg: unknown) => { problems.push(String(msg)); }
        }
    });

    let doc: Document;
    try {
        doc = parser.parseFromString(xml, 'text/xml');
    } catch (e) {
        throw getGridError(GridErrorType.FORMAT_ERROR, config, `${partName} is not well-formed XML (${e instanceof Error ? e.message : String(e)})`);
    }

    if (problems.length > 0 || !doc || !doc.documentElement) {
        const reason = problems.length > 0 ? problems[0] : 'no root element';
        throw getGridError(GridErrorType.FORMAT_ERROR, config, `${partName} is not well-formed XML (${reason})`);
    }
    return doc;
};

/**
 * The name a path component has to match for this node:
 * the local name of an element, `text` for text and CDATA, the DOM node name otherwise.
 */
export const xmlNodeName = (node: Node): string => {
    if (isElement(node)) return localName(node.nodeName);
    if (isTextNode(node)) return TEXT_NODE_NAME;
    return node.nodeName;
};

/**
 * The navigable children of a node, in document order.
 *
 * Elements, text and CDATA count. Comments and processing instructions do not, nor does
 * whitespace-only text that sits beside element siblings (indentation).
 */
export const xmlChildren = (node: Node): Node[] => {
    const childNodes = node.childNodes;
    if (!childNodes) return [];

    let hasElement = false;
    for (let i = 0; i < childNodes.length; i++) {
        if (isElement(childNodes[i])) {
            hasElement = true;
            break;
        }
    }

    const children: Node[] = [];
    for (let i = 0; i < childNodes.length; i++) {
        const child = childNodes[i];
        if (isElement(child)) {
            children.push(child);
        } else if (isTextNode(child)) {
            if (hasElement && child.nodeType === TEXT_NODE && XML_WHITESPACE.test(child.data)) continue;
            children.push(child);
        }
    }
    return children;
};

/**
 * Visits the children of `node` depth first.
 *
 * The callback receives each child with its depth and sibling index and decides, through its
 * {@link VisitAction}, whether to descend into it, skip its subtree or abort everything.
 * Descent stops at {@link MAX_XML_DEPTH}; that is logged and the traversal continues with siblings.
 *
 * @param node - The node whose children are visited
 * @param depth - The depth of `node`; its children are reported at `depth + 1`
 * @param callback - Called for every visited node
 * @param config - Configuration, used for the depth warning
 * @returns false if a callback aborted the traversal, true otherwise
 *
 * @example
 * ```typescript
 * // Count the rows of a sheetData element without looking inside them
 * let rows = 0;
 * visitTree(sheetData, 1, () => { rows++; return VisitAction.Skip; });
 * ```
 */
export const visitTree = (node: Node, depth: number, callback: VisitCallback, config: XlsxGridConfig = {}): boolean => {
    const children = xmlChildren(node);

    for (let index = 0; index < children.length; index++) {
        const child = children[index];
        const action = callback(child, depth + 1, index);

        if (action === VisitAction.Abort) return false;
        if (action === VisitAction.Skip) continue;

        if (depth + 1 >= MAX_XML_DEPTH) {
            logWarning(`Reached maximum nesting depth (${MAX_XML_DEPTH}) in XML tree; not descending further.`, config);
        } else if (!visitTree(child, depth + 1, callback, config)) {
            return false;
        }
    }
    return true;
};

/**
 * Calls `callback` with each child element of `node` in document order, without descending.
 * Text between the elements is not visited, and `index` counts elements only, so `<sheetData>`
 * holding nothing but indentation has no rows.
 *
 * @returns false if the callback aborted, true otherwise
 */
export const forEachChildElement = (node: Node, callback: ElementCallback): boolean => {
    let index = 0;
    for (const child of xmlChildren(node)) {
        if (!isElement(child)) continue;
        if (callback(child, index) === VisitAction.Abort) return false;
        index++;
    }
    return true;
};

const findAt =(node: Node, components: string[], position: number, depth: number, config: XlsxGridConfig): Node | undefined => {
    if (xmlNodeName(node) !== components[position]) return undefined;
    if (position === components.length - 1) return node;

    if (depth + 1 >= MAX_XML_DEPTH) {
        logWarning(`Reached maximum nesting depth (${MAX_XML_DEPTH}) in XML tree while searching.`, config);
        return undefined;
    }

    for (const child of xmlChildren(node)) {
        const found = findAt(child, components, position + 1, depth + 1, config);
        if (found) return found;
    }
    return undefined;
};

/**
 * Looks up the node at a dotted path.
 *
 * The first component names `node` itself; each following component is matched against the
 * children of the previous match, in document order, backtracking to later siblings when a
 * deeper component is missing. Paths with empty components never match.
 *
 * @param node - Where the path starts
 * @param path - Tag names joined with {@link XML_PATH_SEPARATOR}, e.g. `"si.t.text"`
 * @param config - Configuration, used for the depth warning
 * @returns The node, or undefined when the path does not exist
 *
 * @example
 * ```typescript
 * const value = findNode(cell, 'c.v.text'); // text node of <c><v>42</v></c>
 * ```
 */
export const findNode = (node: Node, path: string, config: XlsxGridConfig = {}): Node | undefined => {
    const components = path.split(XML_PATH_SEPARATOR);
    if (components.some(component => component.length === 0)) return undefined;
    return findAt(node, components, 0, 1, config);
};

/**
 * Iterates over the attributes of an element in document order.
 * Namespace declarations (`xmlns`, `xmlns:*`) are skipped; nodes other than elements have none.
 *
 * @returns false if the callback aborted, true otherwise
 */
export const forEachAttribute = (node: Node, callback: AttributeCallback): boolean => {
    if (!isElement(node)) return true;

    const attributes = node.attributes;
    let index = 0;
    for (let i = 0; i < attributes.length; i++) {
        const attr = attributes.item(i);
        if (!attr) continue;
        if (attr.name === 'xmlns' || attr.name.startsWith('xmlns:')) continue;

        if (callback(attr, index) === VisitAction.Abort) return false;
        index++;
    }
    return true;
};

/**
 * Value of the first attribute whose local name is `name`, or undefined.
 */
export const getAttributeValue = (node: Node, name: string): string | undefined => {
    let value: string | undefined;
    forEachAttribute(node, (attr) => {
        if (localName(attr.name) !== name) return;
        value = attr.value;
        return VisitAction.Abort;
    });
    return value;
};

/**
 * Text carried by a text or CDATA node; undefined for anything else.
 */
export const textOf = (node: Node | undefined): string | undefined =>
    node && isTextNode(node) ? node.data : undefined;
