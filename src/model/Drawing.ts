/**
 * Drawing parser: floating pictures anchored to worksheet cells
 * (`xl/drawings/drawing*.xml`).
 */

import { SafeXmlNode } from '../parser/XmlParser';
import { RelEntry, partDir, resolveRelTarget } from '../parser/RelParser';
import { ImageSize, readImageSize } from '../utils/imageSize';

/** Zero-based cell position plus an EMU offset inside that cell. */
export interface AnchorMarker {
  col: number;
  colOff: number;
  row: number;
  rowOff: number;
}

export interface ImageAnchorData {
  from: AnchorMarker;
  /** Size from the picture's transform (`a:xfrm/a:ext`), in EMU. */
  extent?: { cx: number; cy: number };
  /** Intrinsic pixel size read from the image bytes. */
  size?: ImageSize;
  /** Package path of the image part, e.g. `xl/media/image1.png`. */
  path: string;
  data: Uint8Array;
}

function readMarker(node: SafeXmlNode): AnchorMarker {
  const num = (name: string): number => {
    const n = Number(node.child(name).text());
    return Number.isFinite(n) ? n : 0;
  };
  return { col: num('col'), colOff: num('colOff'), row: num('row'), rowOff: num('rowOff') };
}

function readExtent(pic: SafeXmlNode): { cx: number; cy: number } | undefined {
  const ext = pic.child('spPr').child('xfrm').child('ext');
  const cx = ext.numAttr('cx');
  const cy = ext.numAttr('cy');
  if (cx === undefined || cy === undefined) return undefined;
  return { cx, cy };
}

/**
 * Parse a drawing root (`xdr:wsDr`) into image anchors, in document order.
 *
 * @param drawingPath - Package path of the drawing part, used to resolve its rels
 * @param media - Binary parts of the package keyed by path
 */
export function parseDrawing(
  root: SafeXmlNode,
  rels: Map<string, RelEntry>,
  drawingPath: string,
  media: Map<string, Uint8Array>,
): ImageAnchorData[] {
  const images: ImageAnchorData[] = [];
  const baseDir = partDir(drawingPath);

  for (const anchor of root.allChildren()) {
    const kind = anchor.localName;
    if (kind === 'absoluteAnchor') {
      console.warn(`Unsupported absolute drawing anchor in ${drawingPath}`);
      continue;
    }
    if (kind !== 'twoCellAnchor' && kind !== 'oneCellAnchor') continue;

    const pic = anchor.child('pic');
    // Shapes, charts and connectors are not rendered
    if (!pic.exists()) continue;

    const embed = pic.child('blipFill').child('blip').attr('embed');
    const rel = embed ? rels.get(embed) : undefined;
    if (!rel || rel.targetMode === 'External') {
      console.warn(`Picture without an embedded image in ${drawingPath}`);
      continue;
    }

    const path = resolveRelTarget(baseDir, rel.target);
    const data = media.get(path);
    if (!data) {
      console.warn(`Missing image part: ${path}`);
      continue;
    }

    images.push({
      from: readMarker(anchor.child('from')),
      extent: readExtent(pic),
      size: readImageSize(data),
      path,
      data,
    });
  }

  return images;
}
