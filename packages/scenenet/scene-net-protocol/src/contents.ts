import { ObjectIdWire } from "./ObjectId";

/*
 Content shapes for each replicated category. Key names are the ones observers expect on the
 wire, hence the snake_case. All of them are assignable to ComponentContent.
*/

export type UriBytes = {
  scheme: string;
  path: string;
  port: string;
};

export type BufferContent = {
  name?: string;
  size: number;
  inline_bytes?: Uint8Array;
  uri_bytes?: UriBytes;
};

export type BufferViewType = "UNK" | "GEOMETRY" | "IMAGE";

export type BufferViewContent = {
  name?: string;
  source_buffer: ObjectIdWire;
  type: BufferViewType;
  offset: number;
  length: number;
};

export type ImageContent = {
  name?: string;
  buffer_source?: ObjectIdWire;
  uri_source?: string;
};

export type TextureContent = {
  name?: string;
  image: ObjectIdWire;
  sampler?: ObjectIdWire;
};

export type TextureRef = {
  texture: ObjectIdWire;
  transform?: Array<number>;
  texture_coord_slot?: number;
};

export type PbrInfo = {
  name?: string;
  base_color?: Array<number>;
  base_color_texture?: TextureRef;
  metallic?: number;
  roughness?: number;
  use_alpha?: boolean;
};

export type MaterialContent = {
  name?: string;
  pbr_info?: PbrInfo;
  double_sided?: boolean;
};

export type AttributeSemantic = "POSITION" | "NORMAL" | "TANGENT" | "TEXTURE" | "COLOR";

export type GeometryAttribute = {
  view: ObjectIdWire;
  semantic: AttributeSemantic;
  format: string;
  offset?: number;
  stride?: number;
};

export type GeometryIndex = {
  view: ObjectIdWire;
  count: number;
  offset?: number;
  format: "U8" | "U16" | "U32";
};

export type GeometryPatch = {
  attributes: Array<GeometryAttribute>;
  vertex_count: number;
  indices?: GeometryIndex;
  type: "POINTS" | "LINES" | "LINE_LOOP" | "LINE_STRIP" | "TRIANGLES" | "TRIANGLE_STRIP";
  material: ObjectIdWire;
};

export type GeometryContent = {
  name?: string;
  patches: Array<GeometryPatch>;
};

export type RenderRep = {
  mesh: ObjectIdWire;
};

export type EntityContent = {
  name?: string;
  parent?: ObjectIdWire;
  // 16 values, column-major
  transform?: Array<number>;
  null_rep?: boolean;
  render_rep?: RenderRep;
};
