/**
 * GraphQL documents sent to the layout configuration service
 */

export const GET_LAYOUT_OPERATION = 'getLayout';

/**
 * Full layout, revision and tour details for one (geometry, layout, revision) triple
 */
export const GET_LAYOUT_QUERY = `
query getLayout($hashId: String!, $revisionId: String!, $geometry: String) {
	layout(hashId: $hashId, geometry: $geometry, revisionId: $revisionId) {
		...LayoutData
	}
}
fragment LayoutData on Layout {
	privacy
	geometry
	hashId
	parent {
		hashId
	}
	tags {
		id
		hashId
		name
	}
	title
	user {
		annotation
		annotationPublic
		name
		hashId
		pictureUrl
	}
	isDefault
	revision {
		...RevisionData
	}
	lastRevisionCompiled
	isLatestRevision
}
fragment RevisionData on Revision {
	createdAt
	hashId
	model
	title
	config
	swatch
	qmkVersion
	qmkUptodate
	hasDeletedLayers
	md5
	combos {
		keyIndices
		layerIdx
		name
		trigger
	}
	tour {
		...TourData
	}
	layers {
		builtIn
		hashId
		keys
		position
		title
		color
		prevHashId
	}
}
fragment TourData on Tour {
	hashId url steps: tourSteps {
		hashId intro outro position content keyIndex layer {
			hashId position
		}
	}
}
`;
