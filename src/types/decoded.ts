import type { AnimFragment } from '../files/anim-fragment.js';
import type { AnimPack } from '../files/animpack.js';
import type { AnimsTable } from '../files/anims-table.js';
import type { DB } from '../files/db.js';
import type { Loc } from '../files/loc.js';
import type { Audio, Image, RigidModel, Video } from '../files/media.js';
import type { ESF, MatchedCombat, UIC } from '../files/opaque-tail.js';
import type { PortraitSettings } from '../files/portrait-settings.js';
import type { Text } from '../files/text.js';
import type { UnitVariant } from '../files/unit-variant.js';

/** Every decoded representation an entry can have, tagged by `type`. */
export type DecodedFile =
  | DB
  | Loc
  | AnimFragment
  | AnimPack
  | AnimsTable
  | PortraitSettings
  | UnitVariant
  | ESF
  | MatchedCombat
  | UIC
  | Image
  | Audio
  | Video
  | RigidModel
  | Text;

export type DecodedType = DecodedFile['type'];
