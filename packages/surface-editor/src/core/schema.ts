import { Schema } from 'prosemirror-model';
import type { Node as ProseMirrorNode } from 'prosemirror-model';
import { EditorState, TextSelection } from 'prosemirror-state';

/**
 * Plain-text schema: one paragraph per line.
 */
export const surfaceSchema = new Schema({
  nodes: {
    doc: { content: 'paragraph+' },
    paragraph: {
      content: 'text*',
      toDOM: () => ['p', 0],
      parseDOM: [{ tag: 'p' }],
    },
    text: {},
  },
});

export function createSurfaceDoc(content: string, schema: Schema = surfaceSchema): ProseMirrorNode {
  const paragraphs = content.split('\n').map((line) => {
    const children = line.length > 0 ? [schema.text(line)] : [];
    return schema.node('paragraph', null, children);
  });
  return schema.node('doc', null, paragraphs);
}

/**
 * Builds an editor state for `content` with the cursor at the start of the first line.
 */
export function createSurfaceState(content: string, schema: Schema = surfaceSchema): EditorState {
  const doc = createSurfaceDoc(content, schema);
  return EditorState.create({ doc, selection: TextSelection.atStart(doc) });
}
