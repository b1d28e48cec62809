<?xml version="1.0" encoding="UTF-8"?>
<tileset version="1.10" tiledversion="1.10.2" name="terrain" tilewidth="16" tileheight="16" tilecount="64" columns="8">
 <tileoffset x="2" y="-3"/>
 <properties>
  <property name="biome" value="forest"/>
 </properties>
 <image source="terrain.png" width="128" height="128"/>
 <tile id="9" probability="0.5" terrain="0,,1,0"/>
</tileset>
