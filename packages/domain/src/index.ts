/**
 * @satkit/domain
 *
 * The Satellite entity catalogue. Importing this module registers every
 * class under its own name, which is how relation fields find their targets.
 */

import { registerEntities, type EntityClass } from "@satkit/platform";
import { ActivationKey } from "./entities/activation-key/activation-key.entity.js";
import { Architecture } from "./entities/architecture/architecture.entity.js";
import { AuthSourceLDAP } from "./entities/auth-source-ldap/auth-source-ldap.entity.js";
import { Bookmark } from "./entities/bookmark/bookmark.entity.js";
import { CommonParameter } from "./entities/common-parameter/common-parameter.entity.js";
import { ComputeAttribute } from "./entities/compute-attribute/compute-attribute.entity.js";
import { ComputeProfile } from "./entities/compute-profile/compute-profile.entity.js";
import {
  AbstractComputeResource,
  DockerComputeResource,
  LibvirtComputeResource,
} from "./entities/compute-resource/compute-resource.entity.js";
import { ConfigGroup } from "./entities/config-group/config-group.entity.js";
import { ConfigTemplate } from "./entities/config-template/config-template.entity.js";
import { ContentUpload } from "./entities/content-upload/content-upload.entity.js";
import { ContentView } from "./entities/content-view/content-view.entity.js";
import {
  AbstractContentViewFilter,
  ErratumContentViewFilter,
  PackageGroupContentViewFilter,
  RPMContentViewFilter,
} from "./entities/content-view-filter/content-view-filter.entity.js";
import { ContentViewFilterRule } from "./entities/content-view-filter-rule/content-view-filter-rule.entity.js";
import { ContentViewPuppetModule } from "./entities/content-view-puppet-module/content-view-puppet-module.entity.js";
import { ContentViewVersion } from "./entities/content-view-version/content-view-version.entity.js";
import {
  AbstractDockerContainer,
  DockerHubContainer,
} from "./entities/docker-container/docker-container.entity.js";
import { Domain } from "./entities/domain/domain.entity.js";
import { Environment } from "./entities/environment/environment.entity.js";
import { Errata } from "./entities/errata/errata.entity.js";
import { Filter } from "./entities/filter/filter.entity.js";
import { ForemanTask } from "./entities/foreman-task/foreman-task.entity.js";
import { GPGKey } from "./entities/gpg-key/gpg-key.entity.js";
import { Host } from "./entities/host/host.entity.js";
import {
  HostCollection,
  HostCollectionErrata,
  HostCollectionPackage,
} from "./entities/host-collection/host-collection.entity.js";
import { HostGroup } from "./entities/host-group/host-group.entity.js";
import { Image } from "./entities/image/image.entity.js";
import { Interface } from "./entities/interface/interface.entity.js";
import { LifecycleEnvironment } from "./entities/lifecycle-environment/lifecycle-environment.entity.js";
import { Location } from "./entities/location/location.entity.js";
import { Media } from "./entities/media/media.entity.js";
import { Model } from "./entities/model/model.entity.js";
import {
  OperatingSystem,
  OperatingSystemParameter,
} from "./entities/operating-system/operating-system.entity.js";
import { Organization } from "./entities/organization/organization.entity.js";
import { OSDefaultTemplate } from "./entities/os-default-template/os-default-template.entity.js";
import { OverrideValue } from "./entities/override-value/override-value.entity.js";
import { PartitionTable } from "./entities/partition-table/partition-table.entity.js";
import { Permission } from "./entities/permission/permission.entity.js";
import { Ping } from "./entities/ping/ping.entity.js";
import { Product } from "./entities/product/product.entity.js";
import { PuppetClass } from "./entities/puppet-class/puppet-class.entity.js";
import { PuppetModule } from "./entities/puppet-module/puppet-module.entity.js";
import { Realm } from "./entities/realm/realm.entity.js";
import { Report } from "./entities/report/report.entity.js";
import { Repository } from "./entities/repository/repository.entity.js";
import { RHCIDeployment } from "./entities/rhci-deployment/rhci-deployment.entity.js";
import { Role, RoleLDAPGroups } from "./entities/role/role.entity.js";
import { SmartProxy } from "./entities/smart-proxy/smart-proxy.entity.js";
import { SmartVariable } from "./entities/smart-variable/smart-variable.entity.js";
import { Status } from "./entities/status/status.entity.js";
import { Subnet } from "./entities/subnet/subnet.entity.js";
import { Subscription } from "./entities/subscription/subscription.entity.js";
import { SyncPlan } from "./entities/sync-plan/sync-plan.entity.js";
import { System, SystemPackage } from "./entities/system/system.entity.js";
import { TemplateCombination } from "./entities/template-combination/template-combination.entity.js";
import { TemplateKind } from "./entities/template-kind/template-kind.entity.js";
import { User } from "./entities/user/user.entity.js";
import { UserGroup } from "./entities/user-group/user-group.entity.js";

export * from "./entities/activation-key/activation-key.entity.js";
export * from "./entities/architecture/architecture.entity.js";
export * from "./entities/auth-source-ldap/auth-source-ldap.entity.js";
export * from "./entities/bookmark/bookmark.entity.js";
export * from "./entities/common-parameter/common-parameter.entity.js";
export * from "./entities/compute-attribute/compute-attribute.entity.js";
export * from "./entities/compute-profile/compute-profile.entity.js";
export * from "./entities/compute-resource/compute-resource.entity.js";
export * from "./entities/config-group/config-group.entity.js";
export * from "./entities/config-template/config-template.entity.js";
export * from "./entities/content-upload/content-upload.entity.js";
export * from "./entities/content-view/content-view.entity.js";
export * from "./entities/content-view-filter/content-view-filter.entity.js";
export * from "./entities/content-view-filter-rule/content-view-filter-rule.entity.js";
export * from "./entities/content-view-puppet-module/content-view-puppet-module.entity.js";
export * from "./entities/content-view-version/content-view-version.entity.js";
export * from "./entities/docker-container/docker-container.entity.js";
export * from "./entities/domain/domain.entity.js";
export * from "./entities/environment/environment.entity.js";
export * from "./entities/errata/errata.entity.js";
export * from "./entities/filter/filter.entity.js";
export * from "./entities/foreman-task/foreman-task.entity.js";
export * from "./entities/gpg-key/gpg-key.entity.js";
export * from "./entities/host/host.entity.js";
export * from "./entities/host-collection/host-collection.entity.js";
export * from "./entities/host-group/host-group.entity.js";
export * from "./entities/image/image.entity.js";
export * from "./entities/interface/interface.entity.js";
export * from "./entities/lifecycle-environment/lifecycle-environment.entity.js";
export * from "./entities/location/location.entity.js";
export * from "./entities/media/media.entity.js";
export * from "./entities/model/model.entity.js";
export * from "./entities/operating-system/operating-system.entity.js";
export * from "./entities/organization/organization.entity.js";
export * from "./entities/os-default-template/os-default-template.entity.js";
export * from "./entities/override-value/override-value.entity.js";
export * from "./entities/partition-table/partition-table.entity.js";
export * from "./entities/permission/permission.entity.js";
export * from "./entities/ping/ping.entity.js";
export * from "./entities/product/product.entity.js";
export * from "./entities/puppet-class/puppet-class.entity.js";
export * from "./entities/puppet-module/puppet-module.entity.js";
export * from "./entities/realm/realm.entity.js";
export * from "./entities/report/report.entity.js";
export * from "./entities/repository/repository.entity.js";
export * from "./entities/rhci-deployment/rhci-deployment.entity.js";
export * from "./entities/role/role.entity.js";
export * from "./entities/smart-proxy/smart-proxy.entity.js";
export * from "./entities/smart-variable/smart-variable.entity.js";
export * from "./entities/status/status.entity.js";
export * from "./entities/subnet/subnet.entity.js";
export * from "./entities/subscription/subscription.entity.js";
export * from "./entities/sync-plan/sync-plan.entity.js";
export * from "./entities/system/system.entity.js";
export * from "./entities/template-combination/template-combination.entity.js";
export * from "./entities/template-kind/template-kind.entity.js";
export * from "./entities/user/user.entity.js";
export * from "./entities/user-group/user-group.entity.js";
export { OS_FAMILIES, MEDIA_OS_FAMILIES } from "./entities/os-families.js";

/**
 * Every concrete entity class, keyed by the name relation fields use.
 * The generic bases (ComputeResourceBase and friends) are not listed.
 */
export const entities: Record<string, EntityClass> = {
  AbstractComputeResource,
  AbstractContentViewFilter,
  AbstractDockerContainer,
  ActivationKey,
  Architecture,
  AuthSourceLDAP,
  Bookmark,
  CommonParameter,
  ComputeAttribute,
  ComputeProfile,
  ConfigGroup,
  ConfigTemplate,
  ContentUpload,
  ContentView,
  ContentViewFilterRule,
  ContentViewPuppetModule,
  ContentViewVersion,
  DockerComputeResource,
  DockerHubContainer,
  Domain,
  Environment,
  Errata,
  ErratumContentViewFilter,
  Filter,
  ForemanTask,
  GPGKey,
  Host,
  HostCollection,
  HostCollectionErrata,
  HostCollectionPackage,
  HostGroup,
  Image,
  Interface,
  LibvirtComputeResource,
  LifecycleEnvironment,
  Location,
  Media,
  Model,
  OperatingSystem,
  OperatingSystemParameter,
  Organization,
  OSDefaultTemplate,
  OverrideValue,
  PackageGroupContentViewFilter,
  PartitionTable,
  Permission,
  Ping,
  Product,
  PuppetClass,
  PuppetModule,
  Realm,
  Report,
  Repository,
  RHCIDeployment,
  Role,
  RoleLDAPGroups,
  RPMContentViewFilter,
  SmartProxy,
  SmartVariable,
  Status,
  Subnet,
  Subscription,
  SyncPlan,
  System,
  SystemPackage,
  TemplateCombination,
  TemplateKind,
  User,
  UserGroup,
};

registerEntities(entities);
