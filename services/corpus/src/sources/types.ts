export type SourceRef =
  | {
      kind: "file";
      path: string; // As given on the command line, or joined onto the walked directory
    }
  | {
      kind: "url";
      url: string;
    };

export interface FetchedResource {
  url: string;
  finalUrl: string;
  contentType?: string;
  data: Uint8Array;
}
