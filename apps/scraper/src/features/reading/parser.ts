import { JSDOM } from 'jsdom';

// jsdom follows the HTML parsing algorithm, so malformed markup still yields a document
export const parseDocument = (html: string): Document => new JSDOM(html).window.document;
