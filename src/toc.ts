import * as path from 'path';
import { EpubElement } from './element';
import { StructureError } from './errors';
import { resolveArchivePath } from './helpers';
import { Manifest } from './manifest';

/**
 * One entry of the table of contents
 */
export class NavPoint {
  readonly id: string;
  readonly className: string;
  readonly playOrder: number;
  readonly label: string;
  /** Target as written in the NCX, relative to the NCX file */
  readonly contentSource: string;
  readonly contentSourceFile: string;
  readonly contentSourceFragment: string | null;
  readonly children: NavPointList;

  constructor(init: {
    id: string;
    className: string;
    playOrder: number;
    label: string;
    contentSource: string;
    children?: readonly NavPoint[];
  }) {
    this.id = init.id;
    this.className = init.className;
    this.playOrder = init.playOrder;
    this.label = init.label;
    this.contentSource = init.contentSource;
    const hash = init.contentSource.indexOf('#');
    this.contentSourceFile = hash === -1 ? init.contentSource : init.contentSource.slice(0, hash);
    this.contentSourceFragment = hash === -1 ? null : init.contentSource.slice(hash + 1);
    this.children = new NavPointList(init.children ?? []);
  }
}

/**
 * Nav points at one level of the table of contents
 */
export class NavPointList implements Iterable<NavPoint> {
  private readonly points: readonly NavPoint[];

  constructor(points: readonly NavPoint[]) {
    this.points = points;
  }

  get(index: number): NavPoint | null {
    return this.points[index] ?? null;
  }

  get length(): number {
    return this.points.length;
  }

  first(): NavPoint | null {
    return this.get(0);
  }

  last(): NavPoint | null {
    return this.get(this.points.length - 1);
  }

  toArray(): NavPoint[] {
    return [...this.points];
  }

  /**
   * Nav points on any level of this list pointing into a file, in document order
   * @param file Content source file as written in the NCX
   */
  findNavPointsForFile(file: string): NavPoint[] {
    const found: NavPoint[] = [];
    for (const point of this.points) {
      if (point.contentSourceFile === file) {
        found.push(point);
      }
      found.push(...point.children.findNavPointsForFile(file));
    }
    return found;
  }

  [Symbol.iterator](): Iterator<NavPoint> {
    return this.points[Symbol.iterator]();
  }
}

/**
 * The NCX table of contents
 */
export class Toc {
  readonly docTitle: string;
  readonly docAuthor: string;
  readonly navMap: NavPointList;

  constructor(docTitle: string, docAuthor: string, navMap: NavPointList) {
    this.docTitle = docTitle;
    this.docAuthor = docAuthor;
    this.navMap = navMap;
  }

  findNavPointsForFile(file: string): NavPoint[] {
    return this.navMap.findNavPointsForFile(file);
  }
}

export interface TocBuildOptions {
  /** Archive path of the NCX file */
  ncxPath: string;
  manifest: Manifest;
  /** Fail on targets missing from the manifest */
  strict: boolean;
}

function labelText(element: EpubElement | null): string {
  return element?.firstChild('ncx:text')?.unescapedText ?? '';
}

function buildNavPoints(parent: EpubElement, options: TocBuildOptions): NavPoint[] {
  return parent.children('ncx:navPoint').map(element => {
    const contentSource = element.firstChild('ncx:content')?.getAttribute('ncx:src') ?? '';
    const point = new NavPoint({
      id: element.getAttribute('ncx:id'),
      className: element.getAttribute('ncx:class'),
      playOrder: parseInt(element.getAttribute('ncx:playOrder'), 10) || 0,
      label: labelText(element.firstChild('ncx:navLabel')),
      contentSource,
      children: buildNavPoints(element, options),
    });

    if (options.strict) {
      const target = resolveArchivePath(path.posix.dirname(options.ncxPath), point.contentSourceFile);
      if (!options.manifest.findByPath(target)) {
        throw new StructureError(`Navigation point ${point.id} references a file missing in manifest: ${point.contentSourceFile}`);
      }
    }
    return point;
  });
}

/**
 * Builds the table of contents from a parsed NCX document
 * @throws {StructureError} If the NCX has no navMap, or in strict mode when a target is not in the manifest
 */
export function buildToc(ncx: Document, options: TocBuildOptions): Toc {
  const root = new EpubElement(ncx.documentElement);
  const navMap = root.firstChild('ncx:navMap');
  if (!navMap) {
    throw new StructureError(`No navMap element found in ${options.ncxPath}`);
  }
  return new Toc(
    labelText(root.firstChild('ncx:docTitle')),
    labelText(root.firstChild('ncx:docAuthor')),
    new NavPointList(buildNavPoints(navMap, options)),
  );
}
