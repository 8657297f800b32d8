export { UpdateProfileDto } from './update-profile.dto';
export { UpdatePasswordDto } from './update-password.dto';
export { UserProfileDto, ProfileUpdatedResponseDto } from './user-profile.dto';
