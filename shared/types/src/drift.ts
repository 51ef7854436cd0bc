/**
 * IAM Drift Types
 */

// ==========================================
// Resource Hierarchy
// ==========================================

export type NodeType = 'Organization' | 'Folder' | 'Project' | 'Unknown';

export interface HierarchyNode {
  id: string;
  name: string;
  /** Empty for the organization root */
  parentId: string;
  parentType: NodeType | '';
  nodeType: NodeType;
}

export interface HierarchyNodeWithChildren {
  node: HierarchyNode;
  projectIds: string[];
  folderIds: string[];
}

export interface HierarchyGraph {
  idToNodes: Map<string, HierarchyNodeWithChildren>;
}

// ==========================================
// IAM
// ==========================================

export interface IAMCondition {
  title: string;
  expression: string;
  description: string;
}

/**
 * A single member granted a single role on one resource.
 */
export interface AssetIAM {
  resourceId: string;
  resourceType: NodeType;
  member: string;
  role: string;
  condition?: IAMCondition;
}

export interface TerraformStateIAMSource extends AssetIAM {
  stateFileUri: string;
}

// ==========================================
// Ignore List
// ==========================================

export interface IgnoredAssets {
  iamAssets: Set<string>;
  projectIds: Set<string>;
  folderIds: Set<string>;
  roles: Set<string>;
}

// ==========================================
// Drift Result
// ==========================================

export interface IAMDrift {
  clickOpsChanges: Map<string, AssetIAM>;
  missingTerraformChanges: Map<string, TerraformStateIAMSource>;
}
